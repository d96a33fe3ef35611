/**
 * Sandboxed template engine with Jinja-style syntax
 *
 * Supports `{{ expressions }}`, `{% if %}`, `{% for %}`, `{% set %}`,
 * `{% macro %}`, `{% do %}` (as an extension), `{# comments #}` and
 * `{% raw %}` blocks, with filters, tests and whitespace control.
 */

export {
  Environment,
  Template,
  MAX_RANGE,
  type EngineExtension,
  type EnvironmentOptions,
} from "./environment.js";

export { findUndeclaredVariables, findNameReferences } from "./analysis.js";
export { BUILTIN_FILTERS, BUILTIN_TESTS, type FilterHandler, type TestHandler } from "./filters.js";
export { Macro, NativeFunction, SafeString, Undefined, stringify, type CallArguments } from "./runtime.js";
export type { TemplateRoot, NameExpr, Node, Stmt, Expr } from "./nodes.js";
