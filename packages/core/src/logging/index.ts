export {
  JsonLineLogger,
  TextLineLogger,
  createLogScope,
  noopLogger,
  type LogLevel,
  type LogScope,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
