/**
 * Integer Picture Harness - Types
 *
 * Command protocol and output types for stdin/stdout scripting.
 */

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  | 'FORMAT'        // FORMAT 1234 #,##0
  | 'PARSE'         // PARSE 1,222.000
  | 'ASSERT'        // ASSERT 1234 0,000 1,234
  | 'ASSERT_ERROR'  // ASSERT_ERROR (next command should fail)
  | 'ECHO'          // ECHO message
  | 'QUIT';         // QUIT

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Formatted integer
  | 'error'     // Error message
  | 'info'      // Info message
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  /** Integer as written in the command */
  input: string;
  picture: string;
  value: string;
}

export type ErrorType =
  | 'InvalidPictureString'
  | 'InvalidInteger'
  | 'CommandParse'
  | 'StepLimitExceeded'
  | 'UnexpectedSuccess';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType?: ErrorType;
  stack?: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: string;
  actual: string;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | ErrorOutput
  | InfoOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Picture Description
// =============================================================================

export interface PictureDescription {
  picture: string;
  type: 'regular' | 'nonRegular';
  mandatoryDigitMax: number;
  /** Code point of the family zero, e.g. "U+0660" */
  digitFamily: string | null;
  separator?: string;
  groupSize?: number;
  /** Signs in picture order: '#' optional, '0' mandatory, separators as-is */
  signs?: string;
}

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error or failed assertion */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (stacks, banners) */
  verbose: boolean;
  /** Maximum commands per script execution */
  maxStepsPerScript: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
};
