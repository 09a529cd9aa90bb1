#!/usr/bin/env node
/**
 * Integer Picture Harness - CLI Entry Point
 *
 * Usage:
 *   # One-off formatting
 *   format-integer format 1234567 "#,##0"
 *
 *   # Script files
 *   format-integer run tests/grouping.fi tests/families.fi
 *
 *   # REPL or piped mode
 *   format-integer [options]
 *   format-integer < script.fi
 *   echo "FORMAT 1234 0,000" | format-integer
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';
import { parseIntegerInput } from './CommandParser.js';
import { HarnessConfig, DEFAULT_CONFIG } from './types.js';
import { formatInteger } from '../core/formatting/formatInteger.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
  /** Subcommand: undefined for REPL or piped mode */
  subcommand?: 'format' | 'run';
  /** Arguments for subcommand */
  subcommandArgs: string[];
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
    subcommandArgs: [],
  };

  let i = 0;

  // Check for subcommand first
  const first = args[0];
  if (first === 'format' || first === 'run') {
    result.subcommand = first;
    i = 1;
    // Default to pretty output for subcommands
    result.config.outputFormat = 'pretty';
  }

  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--no-line-numbers':
        result.config.includeLineNumbers = false;
        break;
      case '--line-numbers':
        result.config.includeLineNumbers = true;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--no-echo':
        result.config.echoCommands = false;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--quiet':
      case '-q':
        result.config.verbose = false;
        break;
      case '--max-steps': {
        i++;
        const steps = i < args.length ? Number(args[i]) : Number.NaN;
        if (!Number.isInteger(steps) || steps < 1) {
          console.error('--max-steps requires a positive integer');
          process.exit(1);
        }
        result.config.maxStepsPerScript = steps;
        break;
      }
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        // A lone "-" or "-5" is a positional value, e.g. a negative integer
        if (arg.startsWith('-') && !/^-\d+$/.test(arg) && arg !== '-') {
          console.error(`Unknown option: ${arg}`);
          process.exit(1);
        } else if (result.subcommand) {
          result.subcommandArgs.push(arg);
        } else {
          console.error(`Unexpected argument: ${arg}`);
          process.exit(1);
        }
    }
    i++;
  }

  return result;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Integer Picture Harness

USAGE:
  # Format one integer
  format-integer format <integer> <picture>

  # Run script files
  format-integer run <file...> [options]

  # Interactive / Piped mode
  format-integer [options]
  format-integer < script.fi
  echo "FORMAT 1234 0,000" | format-integer

OPTIONS:
  --pretty              Human-readable output (default for format and run)
  --json                JSON output, one object per line (default otherwise)
  --no-timestamps       Omit timestamps from output
  --no-line-numbers     Omit line numbers from output
  --stop-on-error       Stop at the first error or failed assertion
  --continue-on-error   Keep going after failures (default)
  --echo                Echo commands before executing
  --max-steps <n>       Maximum commands per script (default: ${DEFAULT_CONFIG.maxStepsPerScript})
  --verbose, -v         Banners and error stacks
  --quiet, -q           No banners
  --interactive, -i     Force interactive mode
  --help, -h            Show this help message

COMMANDS:
  FORMAT <integer> <picture>              Format an integer
  PARSE <picture>                         Describe a picture
  ASSERT <integer> <picture> <expected>   Compare formatted text
  ASSERT_ERROR                            Expect next command to fail
  ECHO <message>                          Print message
  QUIT                                    Exit harness

  Lines starting with # or // are comments. Quote pictures that
  contain spaces: FORMAT 1234567 "0 000"

EXAMPLES:
  FORMAT 1234 0,000
  FORMAT -1222333 #,##0
  ASSERT 1222333 1,222.000 1,222.333
  PARSE 00,000
  ASSERT_ERROR
  FORMAT 1 0,,0
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (cliArgs.subcommand === 'format') {
    runFormat(cliArgs.subcommandArgs);
    return;
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config);

  if (cliArgs.subcommand === 'run') {
    runFiles(runner, cliArgs.subcommandArgs, config);
    return;
  }

  // Determine if interactive (TTY) or piped input
  const isInteractive = cliArgs.interactive || process.stdin.isTTY;

  if (isInteractive) {
    runInteractive(runner, config);
  } else {
    await runPiped(runner);
  }
}

// =============================================================================
// Subcommands
// =============================================================================

function runFormat(args: string[]): void {
  if (args.length !== 2) {
    console.error('Usage: format-integer format <integer> <picture>');
    process.exit(1);
  }

  const [integer, picture] = args;
  const value = parseIntegerInput(integer);
  if (value === null) {
    console.error(`Error: not an integer: ${integer}`);
    process.exit(1);
  }

  try {
    console.log(formatInteger(value, picture));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

function runFiles(runner: HarnessRunner, files: string[], config: HarnessConfig): void {
  if (files.length === 0) {
    console.error('Error: run command requires at least one file path');
    console.error('Usage: format-integer run <file...>');
    process.exit(1);
  }

  for (const file of files) {
    if (config.verbose) {
      console.log(`Running ${file}`);
    }

    const before = runner.getFailureCount();
    runner.executeScript(fs.readFileSync(file, 'utf8'));
    const failures = runner.getFailureCount() - before;

    if (config.verbose) {
      console.log(`${file}: ${failures === 0 ? 'passed' : `${failures} failure(s)`}`);
    }
    if (failures > 0 && config.stopOnError) {
      break;
    }
  }

  const total = runner.getFailureCount();
  console.log(`\n${files.length} file(s), ${total} failure(s)`);
  process.exit(total === 0 ? 0 : 1);
}

function runInteractive(runner: HarnessRunner, config: HarnessConfig): void {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'fi> ',
  });

  if (config.verbose) {
    console.log('Integer Picture Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  let exitCode = 0;

  rl.prompt();

  rl.on('line', (line) => {
    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      return;
    }

    if (!runner.executeLine(line)) {
      // Stopped by QUIT, or by a failure under --stop-on-error
      exitCode = config.stopOnError && runner.getFailureCount() > 0 ? 1 : 0;
      rl.close();
      return;
    }

    rl.prompt();
  });

  rl.on('close', () => {
    if (config.verbose) {
      console.log('\nGoodbye!');
    }
    process.exit(exitCode);
  });
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];

  // Collect all lines first
  for await (const line of rl) {
    lines.push(line);
  }

  runner.executeScript(lines.join('\n'));
  process.exit(runner.getFailureCount() === 0 ? 0 : 1);
}

// Run
main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
