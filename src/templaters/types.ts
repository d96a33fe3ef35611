import type { ConfigSource } from "../config/config.js";
import type { TemplaterViolation } from "../core/violation.js";

/**
 * Names of the built-in templater variants
 */
export type BuiltinTemplaterName = "raw" | "placeholder" | "jinja";

/**
 * Result of templating one document.
 *
 * A `null` output means the document failed as a whole, whatever else is in
 * `violations`.
 */
export interface TemplaterOutput {
  output: string | null;
  violations: TemplaterViolation[];
}

/**
 * Construction options accepted by templaters; variants ignore what they don't use
 */
export interface TemplaterOptions {
  /** Variables applied over everything else, without type inference */
  overrideContext?: Record<string, unknown>;
  [option: string]: unknown;
}

/**
 * A pluggable text-to-text stage run before parsing
 */
export interface Templater {
  /** Registered name of the variant */
  readonly name: string;

  /**
   * Render a document
   *
   * @param text Source text
   * @param filename Name of the source, used for logging
   * @param config Configuration to read variables and macros from
   */
  process(text: string, filename?: string, config?: ConfigSource): TemplaterOutput;

  /**
   * Whether `other` is the same variant, regardless of options
   */
  equalVariant(other: Templater): boolean;
}

/**
 * Constructs a templater from options
 */
export type TemplaterFactory = (options?: TemplaterOptions) => Templater;
