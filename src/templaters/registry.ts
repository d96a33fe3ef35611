import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { JinjaTemplater } from "./jinja.js";
import { PlaceholderTemplater } from "./placeholder.js";
import { RawTemplater } from "./raw.js";

import type { BuiltinTemplaterName, Templater, TemplaterFactory, TemplaterOptions } from "./types.js";

const log = logger.child("[registry]");

/** Variant used when no templater is named */
export const DEFAULT_TEMPLATER: BuiltinTemplaterName = "jinja";

/**
 * Name-to-factory lookup for templater variants
 */
export class TemplaterRegistry {
  private readonly factories = new Map<string, TemplaterFactory>();

  /**
   * Register a variant; a later registration under the same name wins
   */
  register(name: string, factory: TemplaterFactory): void {
    if (this.factories.has(name)) {
      log.warn(`Templater '${name}' is already registered and will be replaced`);
    }
    this.factories.set(name, factory);
  }

  /**
   * Create a new instance of the named variant
   *
   * @throws ConfigError when no variant is registered under the name
   */
  select(name?: string, options?: TemplaterOptions): Templater {
    const requested = name || DEFAULT_TEMPLATER;
    const factory = this.factories.get(requested);
    if (!factory) {
      throw new ConfigError(
        `Requested templater '${requested}' which is not currently available. Try one of ${this.names().join(", ")}`,
        { requested, available: this.names() }
      );
    }
    return factory(options);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /** Registered names in registration order */
  names(): string[] {
    return [...this.factories.keys()];
  }
}

/**
 * A registry holding the built-in variants
 */
export function createDefaultRegistry(): TemplaterRegistry {
  const registry = new TemplaterRegistry();
  registry.register("raw", () => new RawTemplater());
  registry.register("placeholder", (options) => new PlaceholderTemplater(options));
  registry.register("jinja", (options) => new JinjaTemplater(options));
  return registry;
}

/**
 * Process-wide registry used by {@link registerTemplater} and {@link selectTemplater}
 */
export const templaterRegistry = createDefaultRegistry();

export function registerTemplater(name: string, factory: TemplaterFactory): void {
  templaterRegistry.register(name, factory);
}

export function selectTemplater(name?: string, options?: TemplaterOptions): Templater {
  return templaterRegistry.select(name, options);
}
