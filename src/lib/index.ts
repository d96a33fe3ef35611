// Error classes
export {
  WeaveError,
  ConfigError,
  TemplaterError,
  TemplateSyntaxError,
  TemplateRuntimeError,
  UndefinedError,
  SecurityError,
  describeError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrapOr,
  tryCatch,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger, isLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
