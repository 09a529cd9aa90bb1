/**
 * Integer Picture Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...]
 *
 * Formatting:
 *   FORMAT 1234 0,000                      - Format an integer
 *   FORMAT -1234567 "0 000"                - Quote pictures containing spaces
 *   PARSE #,##0                            - Describe a picture
 *
 * Assertions:
 *   ASSERT 1234 0,000 1,234                - Compare formatted text
 *   ASSERT_ERROR                           - Next command should fail
 *
 * Utility:
 *   ECHO message / QUIT
 *
 * Lines starting with # or // are comments. A token opening with a quote
 * runs to the matching quote; quotes inside a token are literal, so
 * pictures such as 0'000 need no quoting.
 */

import { CommandType, ParsedCommand } from './types.js';

// =============================================================================
// Integer Arguments
// =============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/u;

/**
 * Parse a decimal integer argument. Returns null when the text is not one.
 */
export function parseIntegerInput(raw: string): bigint | null {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) return null;
  return BigInt(text);
}

// =============================================================================
// Command Parser
// =============================================================================

const VALID_COMMANDS: ReadonlySet<string> = new Set<string>([
  'FORMAT', 'PARSE',
  'ASSERT', 'ASSERT_ERROR',
  'ECHO', 'QUIT',
]);

function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.has(value);
}

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    const commandStr = tokens[0].toUpperCase();
    if (!isCommandType(commandStr)) {
      throw new CommandParseError(`Unknown command: ${tokens[0]}`, lineNumber, trimmed);
    }

    return {
      type: commandStr,
      args: tokens.slice(1),
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines. Line numbers start at 1.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Split on spaces and tabs, honouring quoted tokens.
   */
  private tokenize(line: string, lineNumber: number): string[] {
    const tokens: string[] = [];
    let current = '';
    let started = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (quoteChar !== '') {
        if (char === quoteChar) {
          tokens.push(current);
          current = '';
          started = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          const next = line[i + 1];
          if (next === quoteChar || next === '\\') {
            current += next;
            i++;
          } else if (next === 'n') {
            current += '\n';
            i++;
          } else if (next === 't') {
            current += '\t';
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else if (char === ' ' || char === '\t') {
        if (started) {
          tokens.push(current);
          current = '';
          started = false;
        }
      } else if (!started && (char === '"' || char === "'")) {
        quoteChar = char;
      } else {
        current += char;
        started = true;
      }
    }

    if (quoteChar !== '') {
      throw new CommandParseError('Unterminated string', lineNumber, line);
    }

    if (started) {
      tokens.push(current);
    }

    return tokens;
  }
}

// =============================================================================
// Parse Error
// =============================================================================

export class CommandParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'CommandParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
