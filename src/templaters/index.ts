/**
 * Templaters: text-to-text stages run over SQL before it is parsed
 */

export {
  TemplaterRegistry,
  createDefaultRegistry,
  templaterRegistry,
  registerTemplater,
  selectTemplater,
  DEFAULT_TEMPLATER,
} from "./registry.js";

export { RawTemplater } from "./raw.js";
export { PlaceholderTemplater } from "./placeholder.js";
export { JinjaTemplater } from "./jinja.js";
export { ContextBuilder, DEFAULT_CONTEXT, type TemplateContext } from "./context.js";
export { parseLiteral, inferType, type LiteralValue } from "./literal.js";

export type {
  BuiltinTemplaterName,
  Templater,
  TemplaterFactory,
  TemplaterOptions,
  TemplaterOutput,
} from "./types.js";
