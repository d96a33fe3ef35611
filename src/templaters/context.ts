import { ContextSectionSchema } from "../config/schema.js";
import { readTemplaterSection } from "../config/config.js";
import { logger } from "../lib/logger.js";

import { inferType } from "./literal.js";

import type { ConfigSource } from "../config/config.js";

const log = logger.child("[context]");

/**
 * Variables available while rendering, in insertion order
 */
export type TemplateContext = Map<string, unknown>;

/**
 * Values every template can rely on
 */
export const DEFAULT_CONTEXT: Readonly<Record<string, unknown>> = Object.freeze({
  test_value: "__test__",
});

/**
 * Copies lists, maps and plain objects so a render cannot mutate the caller's data.
 * Other values are shared.
 */
function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(copyValue);
  }
  if (value instanceof Map) {
    return new Map(Array.from(value, ([key, entry]): [unknown, unknown] => [key, copyValue(entry)]));
  }
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      const copy: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        copy[key] = copyValue(entry);
      }
      return copy;
    }
  }
  return value;
}

/**
 * Builds the layered template context for one templater variant.
 *
 * Layers, lowest priority first:
 * 1. built-in defaults
 * 2. `templater.<variant>.context` from config, text values type-inferred
 * 3. caller overrides, taken verbatim
 */
export class ContextBuilder {
  private readonly overrides: Readonly<Record<string, unknown>>;

  constructor(
    private readonly variant: string,
    overrides: Record<string, unknown> = {}
  ) {
    this.overrides = { ...overrides };
  }

  build(filename?: string, config?: ConfigSource): TemplateContext {
    const loaded = readTemplaterSection(config, this.variant, "context", ContextSectionSchema);
    const context: TemplateContext = new Map();

    for (const [key, value] of Object.entries(DEFAULT_CONTEXT)) {
      context.set(key, value);
    }
    for (const [key, value] of Object.entries(loaded)) {
      context.set(key, typeof value === "string" ? inferType(value) : copyValue(value));
    }
    for (const [key, value] of Object.entries(this.overrides)) {
      context.set(key, copyValue(value));
    }

    log.debug(
      `Built context for ${filename ?? "<string>"}: ${context.size} variables ` +
        `(${Object.keys(loaded).length} from config, ${Object.keys(this.overrides).length} overrides)`
    );
    return context;
  }
}
