/**
 * Integer Picture Harness - Runner
 *
 * Executes parsed commands against the picture formatter
 * and produces structured output.
 */

import {
  ParsedCommand,
  Output,
  ResultOutput,
  ValueOutput,
  ErrorOutput,
  ErrorType,
  InfoOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
  PictureDescription,
  DEFAULT_CONFIG,
} from './types.js';
import { CommandParser, CommandParseError, parseIntegerInput } from './CommandParser.js';
import { formatInteger } from '../core/formatting/formatInteger.js';
import { Picture } from '../core/picture/Picture.js';
import { InvalidPictureError } from '../core/picture/PictureParser.js';
import type { Sign } from '../core/picture/types.js';

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Error thrown when a command argument is not a decimal integer.
 */
export class InvalidIntegerError extends Error {
  input: string;

  constructor(input: string) {
    super(`Not an integer: ${JSON.stringify(input)}`);
    this.name = 'InvalidIntegerError';
    this.input = input;
  }
}

function errorTypeOf(error: Error): ErrorType | undefined {
  if (error instanceof InvalidPictureError) return 'InvalidPictureString';
  if (error instanceof InvalidIntegerError) return 'InvalidInteger';
  if (error instanceof CommandParseError) return 'CommandParse';
  return undefined;
}

// =============================================================================
// Picture Description
// =============================================================================

function signText(sign: Sign): string {
  switch (sign.type) {
    case 'optionalDigit': return '#';
    case 'mandatoryDigit': return '0';
    case 'groupSeparator': return sign.char;
  }
}

/**
 * Summarize a parsed picture for PARSE output.
 */
export function describePicture(picture: Picture): PictureDescription {
  const { pattern, digitFamily } = picture;
  const description: PictureDescription = {
    picture: picture.source,
    type: pattern.type,
    mandatoryDigitMax: pattern.mandatoryDigitMax,
    digitFamily: digitFamily ? digitFamily.codePointLabel : null,
  };

  if (pattern.type === 'regular') {
    description.separator = pattern.separator;
    description.groupSize = pattern.groupSize;
  } else {
    description.signs = pattern.signs.map(signText).join('');
  }

  return description;
}

// =============================================================================
// Harness Runner
// =============================================================================

/** Where an output came from: a parsed command, or a line that failed to parse */
type CommandRef = Pick<ParsedCommand, 'raw' | 'lineNumber'>;

interface StepOutcome {
  output: Output;
  /** False after QUIT, or after a failure under stopOnError */
  proceed: boolean;
}

function isFailure(output: Output): boolean {
  return output.type === 'error' || (output.type === 'assert' && !output.passed);
}

export class HarnessRunner {
  private config: HarnessConfig;
  private parser: CommandParser = new CommandParser();
  private expectError: boolean = false;

  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Lines read through executeLine, for line numbers in interactive mode */
  private linesRead: number = 0;
  /** Errors and failed assertions emitted so far */
  private failureCount: number = 0;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command. Never throws: failures become error outputs.
   * The output is returned, not emitted.
   */
  execute(cmd: ParsedCommand): Output {
    const expectingError = this.expectError && cmd.type !== 'ASSERT_ERROR';

    try {
      const result = this.executeCommand(cmd);

      if (expectingError) {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd, 'UnexpectedSuccess');
      }

      return result;
    } catch (error) {
      return this.fail(error, cmd);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  executeAll(commands: ParsedCommand[]): Output[] {
    const outputs: Output[] = [];
    this.stepCount = 0;

    for (const cmd of commands) {
      const outcome = this.runCommand(cmd, true);
      outputs.push(outcome.output);
      if (!outcome.proceed) break;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      // Formatting
      case 'FORMAT': return this.cmdFormat(cmd);
      case 'PARSE': return this.cmdParse(cmd);

      // Assertions
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Utility
      case 'ECHO': return this.cmdEcho(cmd);
      case 'QUIT': return this.cmdQuit(cmd);
    }
  }

  // ===========================================================================
  // Formatting Commands
  // ===========================================================================

  private cmdFormat(cmd: ParsedCommand): Output {
    const [integer, picture] = this.requireArgs(cmd, 2, 'FORMAT <integer> <picture>');
    const value = this.parseInteger(integer);
    return this.createValue(integer, picture, formatInteger(value, picture), cmd);
  }

  private cmdParse(cmd: ParsedCommand): Output {
    const [picture] = this.requireArgs(cmd, 1, 'PARSE <picture>');
    return this.createResult(true, describePicture(Picture.parse(picture)), cmd);
  }

  // ===========================================================================
  // Assertion Commands
  // ===========================================================================

  private cmdAssert(cmd: ParsedCommand): Output {
    const [integer, picture, expected] = this.requireArgs(
      cmd,
      3,
      'ASSERT <integer> <picture> <expected>'
    );
    const actual = formatInteger(this.parseInteger(integer), picture);
    const passed = actual === expected;

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${integer} with ${JSON.stringify(picture)}`,
    };

    return output;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdEcho(cmd: ParsedCommand): Output {
    return this.createEcho(cmd.args.join(' '), cmd);
  }

  private cmdQuit(cmd: ParsedCommand): Output {
    return this.createInfo('Quitting', cmd);
  }

  // ===========================================================================
  // Argument Helpers
  // ===========================================================================

  private requireArgs(cmd: ParsedCommand, count: number, usage: string): string[] {
    if (cmd.args.length !== count) {
      throw new Error(`${cmd.type} expects ${count} argument(s), got ${cmd.args.length}. Usage: ${usage}`);
    }
    return cmd.args;
  }

  private parseInteger(raw: string): bigint {
    const value = parseIntegerInput(raw);
    if (value === null) throw new InvalidIntegerError(raw);
    return value;
  }

  // ===========================================================================
  // Step Handling
  // ===========================================================================

  private runLine(line: string, lineNumber: number, limited: boolean): StepOutcome | null {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      return this.finish(this.fail(error, { raw: line.trim(), lineNumber }), false);
    }

    if (!cmd) return null;
    return this.runCommand(cmd, limited);
  }

  private runCommand(cmd: ParsedCommand, limited: boolean): StepOutcome {
    if (limited) {
      this.stepCount++;
      if (this.stepCount > this.config.maxStepsPerScript) {
        const output = this.createStepLimitError(cmd);
        this.record(output);
        return { output, proceed: false };
      }
    }

    if (this.config.echoCommands) {
      this.emit(this.createEcho(cmd.raw, cmd));
    }

    return this.finish(this.execute(cmd), cmd.type === 'QUIT');
  }

  private finish(output: Output, quit: boolean): StepOutcome {
    this.record(output);
    const stop = quit || (isFailure(output) && this.config.stopOnError);
    return { output, proceed: !stop };
  }

  private fail(error: unknown, ref: CommandRef): Output {
    const err = error instanceof Error ? error : new Error(String(error));

    if (this.expectError) {
      this.expectError = false;
      return this.createResult(true, { expectedError: true, message: err.message }, ref);
    }

    return this.createError(err.message, ref, errorTypeOf(err), err.stack);
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, ref: CommandRef): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: ref.raw,
      lineNumber: ref.lineNumber,
      success,
      data,
    };
  }

  private createValue(input: string, picture: string, value: string, ref: CommandRef): ValueOutput {
    return {
      type: 'value',
      timestamp: Date.now(),
      command: ref.raw,
      lineNumber: ref.lineNumber,
      input,
      picture,
      value,
    };
  }

  private createError(
    message: string,
    ref: CommandRef,
    errorType?: ErrorType,
    stack?: string
  ): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: ref.raw,
      lineNumber: ref.lineNumber,
      message,
      errorType,
      stack: this.config.verbose ? stack : undefined,
    };
  }

  private createStepLimitError(cmd: ParsedCommand): ErrorOutput {
    return this.createError(
      `Step limit exceeded: ${this.stepCount} steps (max: ${this.config.maxStepsPerScript})`,
      cmd,
      'StepLimitExceeded'
    );
  }

  private createInfo(message: string, ref: CommandRef): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: ref.raw,
      lineNumber: ref.lineNumber,
      message,
    };
  }

  private createEcho(message: string, ref: CommandRef): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: ref.raw,
      lineNumber: ref.lineNumber,
      message,
    };
  }

  private record(output: Output): void {
    if (isFailure(output)) this.failureCount++;
    this.emit(output);
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const text = formatOutput(output, this.config);
    if (output.type === 'error') {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false after QUIT, or after a failure when stopOnError is set.
   */
  executeLine(line: string): boolean {
    this.linesRead++;
    const outcome = this.runLine(line, this.linesRead, false);
    return outcome === null || outcome.proceed;
  }

  /**
   * Execute a script (multiple lines). Lines that fail to parse become error
   * outputs instead of aborting the whole script.
   */
  executeScript(script: string): Output[] {
    const outputs: Output[] = [];
    this.stepCount = 0;

    const lines = script.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const outcome = this.runLine(lines[i], i + 1, true);
      if (outcome === null) continue;
      outputs.push(outcome.output);
      if (!outcome.proceed) break;
    }

    return outputs;
  }

  /**
   * Get current step count (for monitoring/progress).
   */
  getStepCount(): number {
    return this.stepCount;
  }

  /**
   * Errors and failed assertions emitted since the runner was created.
   */
  getFailureCount(): number {
    return this.failureCount;
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

type FormatOptions = Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps' | 'includeLineNumbers'>;

/**
 * One JSON object per output, without the fields the config leaves out.
 */
export function serializeOutput(output: Output, options: FormatOptions): string {
  const record: Record<string, unknown> = { ...output };
  if (!options.includeTimestamps) delete record.timestamp;
  if (!options.includeLineNumbers) delete record.lineNumber;
  return JSON.stringify(record);
}

/**
 * Human-readable rendering of an output.
 */
export function prettyPrint(output: Output, options: FormatOptions): string {
  let prefix = '';
  if (options.includeTimestamps) {
    prefix += `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `;
  }
  if (options.includeLineNumbers && output.lineNumber) {
    prefix += `[${output.lineNumber}] `;
  }

  switch (output.type) {
    case 'result': {
      const status = output.success ? 'OK' : 'FAILED';
      return output.data === undefined
        ? `${prefix}${status}`
        : `${prefix}${status} ${JSON.stringify(output.data)}`;
    }

    case 'value':
      return `${prefix}= ${output.value}`;

    case 'error':
      return output.stack
        ? `${prefix}ERROR: ${output.message}\n${output.stack}`
        : `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'echo':
      return `${prefix}${output.message}`;

    case 'assert':
      return output.passed
        ? `${prefix}ASSERT passed`
        : `${prefix}ASSERT failed: expected ${JSON.stringify(output.expected)}, got ${JSON.stringify(output.actual)}`;
  }
}

/**
 * Render an output in the configured format.
 */
export function formatOutput(output: Output, options: FormatOptions): string {
  return options.outputFormat === 'json'
    ? serializeOutput(output, options)
    : prettyPrint(output, options);
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
