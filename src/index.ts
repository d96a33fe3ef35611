/**
 * sqlweave - pluggable templating for SQL sources
 *
 * @packageDocumentation
 */

// Templaters
export {
  TemplaterRegistry,
  createDefaultRegistry,
  templaterRegistry,
  registerTemplater,
  selectTemplater,
  DEFAULT_TEMPLATER,
  RawTemplater,
  PlaceholderTemplater,
  JinjaTemplater,
  ContextBuilder,
  DEFAULT_CONTEXT,
  parseLiteral,
  inferType,
} from "./templaters/index.js";

export type {
  BuiltinTemplaterName,
  Templater,
  TemplaterFactory,
  TemplaterOptions,
  TemplaterOutput,
  TemplateContext,
  LiteralValue,
} from "./templaters/index.js";

// Configuration
export { TemplaterConfig, readTemplaterSection, templaterSectionPath } from "./config/index.js";
export type { ConfigSource } from "./config/index.js";

// Positions and violations
export {
  createPositionMarker,
  locateIdentifier,
  undefinedVariableViolation,
  fatalViolation,
  hasFatalViolation,
} from "./core/index.js";

export type { PositionMarker, TemplaterViolation, ViolationCode } from "./core/index.js";

// Engine
export { Environment, Template, findUndeclaredVariables, findNameReferences } from "./engine/index.js";
export type { EngineExtension, EnvironmentOptions, TemplateRoot } from "./engine/index.js";

// Errors, results and logging
export {
  WeaveError,
  ConfigError,
  TemplaterError,
  TemplateSyntaxError,
  TemplateRuntimeError,
  UndefinedError,
  SecurityError,
  ok,
  err,
  unwrapOr,
  tryCatch,
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
