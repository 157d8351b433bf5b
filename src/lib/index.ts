export * from "./format/index.ts";
export * from "./image/index.ts";
export * from "./utils/errors.ts";
export {
  LogEventType,
  LogLevel,
  Logger,
  logger,
  type LogEntry,
  type LogListener,
} from "./utils/logger.ts";
