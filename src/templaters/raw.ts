import type { ConfigSource } from "../config/config.js";
import type { Templater, TemplaterOutput } from "./types.js";

/**
 * A templater which returns its input unchanged
 */
export class RawTemplater implements Templater {
  readonly name = "raw";

  process(text: string, _filename?: string, _config?: ConfigSource): TemplaterOutput {
    return { output: text, violations: [] };
  }

  equalVariant(other: Templater): boolean {
    return other instanceof RawTemplater;
  }
}
