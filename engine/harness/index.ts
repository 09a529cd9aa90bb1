/**
 * Integer Picture Harness - Module Exports
 *
 * A text-based harness for the picture formatter.
 * Enables scripted testing via stdin/stdout command protocol.
 */

export {
  CommandParser,
  createCommandParser,
  CommandParseError,
  parseIntegerInput,
} from './CommandParser.js';

export {
  HarnessRunner,
  createHarnessRunner,
  InvalidIntegerError,
  describePicture,
  formatOutput,
  serializeOutput,
  prettyPrint,
} from './HarnessRunner.js';

export type {
  CommandType,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  ErrorType,
  ErrorOutput,
  InfoOutput,
  AssertOutput,
  EchoOutput,
  PictureDescription,
  HarnessConfig,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
