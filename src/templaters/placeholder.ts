import { TemplaterError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { Undefined, getAttribute, getItem, repr, stringify } from "../engine/runtime.js";

import { ContextBuilder } from "./context.js";

import type { ConfigSource } from "../config/config.js";
import type { TemplateContext } from "./context.js";
import type { Templater, TemplaterOptions, TemplaterOutput } from "./types.js";

const log = logger.child("[placeholder]");

/** Identifier at the start of a field */
const FIELD_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*/;
/** One `.attr` or `[key]` step after the field name */
const ACCESSOR_REGEX = /^(?:\.([A-Za-z_][A-Za-z0-9_]*)|\[([^\]]+)\])/;

/**
 * A parsed `{...}` replacement field
 */
interface ReplacementField {
  /** Source text between the braces */
  source: string;
  name: string;
  accessors: Array<{ kind: "attr" | "item"; key: string }>;
  conversion: "s" | "r";
}

/**
 * Substitutes `{name}` fields from the template context.
 *
 * Fields may reach into values with `{name.attr}` and `{name[key]}` and pick
 * a conversion with `!s` (default) or `!r`. Literal braces are written `{{`
 * and `}}`.
 *
 * @example
 * ```typescript
 * const templater = new PlaceholderTemplater({ overrideContext: { table: "users" } });
 * templater.process("select * from {table}").output; // "select * from users"
 * ```
 */
export class PlaceholderTemplater implements Templater {
  readonly name = "placeholder";
  private readonly contextBuilder: ContextBuilder;

  constructor(options: TemplaterOptions = {}) {
    this.contextBuilder = new ContextBuilder(this.name, options.overrideContext);
  }

  buildContext(filename?: string, config?: ConfigSource): TemplateContext {
    return this.contextBuilder.build(filename, config);
  }

  process(text: string, filename?: string, config?: ConfigSource): TemplaterOutput {
    const context = this.buildContext(filename, config);
    let output = "";
    let index = 0;

    while (index < text.length) {
      const char = text.charAt(index);
      const next = text.charAt(index + 1);

      if (char === "{" && next === "{") {
        output += "{";
        index += 2;
      } else if (char === "}" && next === "}") {
        output += "}";
        index += 2;
      } else if (char === "}") {
        throw new TemplaterError("Single '}' encountered in format string", { filename, offset: index });
      } else if (char === "{") {
        const close = text.indexOf("}", index + 1);
        if (close === -1) {
          throw new TemplaterError("Single '{' encountered in format string", { filename, offset: index });
        }
        const field = parseField(text.slice(index + 1, close));
        output += this.substitute(field, context);
        index = close + 1;
      } else {
        output += char;
        index++;
      }
    }

    log.debug(`Substituted placeholders in ${filename ?? "<string>"}`);
    return { output, violations: [] };
  }

  equalVariant(other: Templater): boolean {
    return other instanceof PlaceholderTemplater;
  }

  private substitute(field: ReplacementField, context: TemplateContext): string {
    if (!context.has(field.name)) {
      throw new TemplaterError(
        `Failure in placeholder templating: missing variable '${field.name}'. Have you configured your variables?`,
        { field: field.name }
      );
    }

    let value = context.get(field.name);
    for (const accessor of field.accessors) {
      value =
        accessor.kind === "attr"
          ? getAttribute(value, accessor.key)
          : getItem(value, /^\d+$/.test(accessor.key) ? Number(accessor.key) : accessor.key);
      if (value instanceof Undefined) {
        throw new TemplaterError(
          `Failure in placeholder templating: cannot resolve '${field.source}'. Have you configured your variables?`,
          { field: field.source }
        );
      }
    }

    return field.conversion === "r" ? repr(value) : stringify(value);
  }
}

function parseField(source: string): ReplacementField {
  if (source.includes("{")) {
    throw new TemplaterError(`Unexpected '{' in field '${source}'`);
  }

  let rest = source;
  let conversion: "s" | "r" = "s";

  const bang = rest.indexOf("!");
  const colon = rest.indexOf(":");
  if (colon !== -1 && (bang === -1 || colon < bang)) {
    throw new TemplaterError(`Format specifications are not supported: '{${source}}'`);
  }
  if (bang !== -1) {
    const flag = rest.slice(bang + 1);
    if (flag === "s" || flag === "r") {
      conversion = flag;
    } else {
      throw new TemplaterError(`Unknown conversion specifier '${flag}' in '{${source}}'`);
    }
    rest = rest.slice(0, bang);
  }

  if (rest === "" || /^\d/.test(rest)) {
    throw new TemplaterError(`Positional fields are not supported: '{${source}}'`);
  }

  const nameMatch = FIELD_NAME_REGEX.exec(rest);
  if (!nameMatch) {
    throw new TemplaterError(`Invalid field name '${rest}'`);
  }
  const name = nameMatch[0];
  rest = rest.slice(name.length);

  const accessors: ReplacementField["accessors"] = [];
  while (rest.length > 0) {
    const step = ACCESSOR_REGEX.exec(rest);
    if (!step) {
      throw new TemplaterError(`Invalid field name '${source}'`);
    }
    accessors.push(step[1] !== undefined ? { kind: "attr", key: step[1] } : { kind: "item", key: step[2] ?? "" });
    rest = rest.slice(step[0].length);
  }

  return { source, name, accessors, conversion };
}
