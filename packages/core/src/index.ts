export {
  JsonLineLogger,
  TextLineLogger,
  createLogScope,
  noopLogger,
  type LogLevel,
  type LogScope,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export { formatDurationMs, serialiseError, type WritableTarget } from './reporting/index.js';

export {
  DEFAULT_PLANVIEW_CONFIG_FILES,
  findConfigModule,
  loadConfigModule,
  type FindConfigModuleOptions,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
} from './config/index.js';
