import YAML from "yaml";

import { ConfigError, describeError } from "../lib/errors.js";

import { ConfigRootSchema, TEMPLATER_SECTION } from "./schema.js";

import type { TemplaterSection } from "./schema.js";
import type { z } from "zod";

/**
 * Key-path lookup consumed by templaters
 */
export interface ConfigSource {
  /** Value at a key path, or undefined when any step is missing */
  getSection(path: readonly string[]): unknown;
}

/**
 * Check for a plain mapping (not an array or null)
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * In-memory configuration addressed by section paths
 *
 * @example
 * ```typescript
 * const config = new TemplaterConfig({
 *   templater: { jinja: { context: { schema_name: "analytics" } } },
 * });
 *
 * config.getSection(["templater", "jinja", "context"]);
 * // { schema_name: "analytics" }
 * ```
 */
export class TemplaterConfig implements ConfigSource {
  private readonly values: Record<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    const result = ConfigRootSchema.safeParse(values);
    if (!result.success) {
      throw new ConfigError("Configuration root must be a mapping", {
        issues: result.error.issues,
      });
    }
    this.values = result.data;
  }

  /**
   * Parse a YAML document into a configuration
   */
  static fromYaml(text: string): TemplaterConfig {
    let parsed: unknown;
    try {
      parsed = YAML.parse(text);
    } catch (error) {
      throw new ConfigError(`Invalid YAML configuration: ${describeError(error)}`);
    }

    if (parsed === null || parsed === undefined) {
      return new TemplaterConfig();
    }
    if (!isMapping(parsed)) {
      throw new ConfigError("Configuration root must be a mapping");
    }
    return new TemplaterConfig(parsed);
  }

  /**
   * Get the value at a key path, or undefined when any step is missing
   */
  getSection(path: readonly string[]): unknown {
    let current: unknown = this.values;
    for (const key of path) {
      if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
        return undefined;
      }
      current = current[key];
    }
    return current;
  }
}

/**
 * Section path for a templater variant
 */
export function templaterSectionPath(variant: string, section: TemplaterSection): readonly string[] {
  return [TEMPLATER_SECTION, variant, section];
}

/**
 * Read and validate a templater section; an absent section reads as empty
 */
export function readTemplaterSection<V>(
  config: ConfigSource | undefined,
  variant: string,
  section: TemplaterSection,
  schema: z.ZodType<Record<string, V>>
): Record<string, V> {
  const path = templaterSectionPath(variant, section);
  const raw = config?.getSection(path);
  if (raw === undefined) {
    return {};
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration section '${path.join(".")}': ${details}`, {
      path,
      issues: result.error.issues,
    });
  }
  return result.data;
}
