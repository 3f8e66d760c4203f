/**
 * reqlog: request-correlated logging for Node.js HTTP servers
 */

export { loadConfig, parseConfig, getDefaultConfigPath } from "./config/loader.js";
export type { Config, LoggingConfig, ServerConfig, ColorMode, LoadedConfig } from "./config/types.js";
export {
  currentRequestId,
  requestIdOf,
  resolveRequestId,
  runWithRequestId,
  setRequestId,
} from "./context/request-id.js";
export { LogFramework, logs, defineTag, findTag, tagsOf } from "./logs/framework.js";
export { formatEntry, formatSourceColumn, formatTimestamp, requestIdColumn, LEVEL_STYLES } from "./logs/format.js";
export { BufferedReporter, requestIdTag } from "./logs/reporter.js";
export type { DiagnosticStream, ReporterOptions, ReporterStats } from "./logs/reporter.js";
export { LoggingRuntime, initialize, initializeOptionsFrom, runtime } from "./logs/runtime.js";
export type { InitializeOptions } from "./logs/runtime.js";
export { createLogSource, defaultLog, defaultSourceOf } from "./logs/source.js";
export type { LogFn, LogSource } from "./logs/source.js";
export type { FilterLevel, LogLevel, LogRecord, LogSrc, Reporter, TagDef, Tags } from "./logs/types.js";
export { assignRequestId } from "./http/request-id.js";
export { createLoggedServer } from "./http/server.js";
export { createTrafficLogger, logTraffic } from "./http/traffic.js";
export { pipeline } from "./http/types.js";
export type { Handler, Middleware } from "./http/types.js";
