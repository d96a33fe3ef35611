import { SecurityError, TemplateRuntimeError } from "../lib/errors.js";

import { Evaluator } from "./evaluator.js";
import { BUILTIN_FILTERS, BUILTIN_TESTS } from "./filters.js";
import { tokenize } from "./lexer.js";
import { parseTokens } from "./parser.js";
import { Macro, NativeFunction, Scope, createMapping, typeName } from "./runtime.js";

import type { FilterHandler, TestHandler } from "./filters.js";
import type { TemplateRoot } from "./nodes.js";
import type { CallArguments } from "./runtime.js";

/**
 * Statement extensions that can be switched on
 */
export type EngineExtension = "do";

export interface EnvironmentOptions {
  /** Keep a single trailing newline of the source (default false) */
  keepTrailingNewline?: boolean;
  /** HTML-escape output expressions (default false) */
  autoescape?: boolean;
  extensions?: readonly EngineExtension[];
}

/** Largest sequence `range()` may build */
export const MAX_RANGE = 100_000;

function rangeGlobal({ args }: CallArguments): number[] {
  const numbers = args.map((arg) => {
    if (typeof arg !== "number" || !Number.isInteger(arg)) {
      throw new TemplateRuntimeError(`'${typeName(arg)}' object cannot be interpreted as an integer`);
    }
    return arg;
  });
  if (numbers.length === 0 || numbers.length > 3) {
    throw new TemplateRuntimeError(`range expected 1 to 3 arguments, got ${numbers.length}`);
  }
  const [start, stop, step]: [number, number, number] =
    numbers.length === 1 ? [0, numbers[0] ?? 0, 1] : [numbers[0] ?? 0, numbers[1] ?? 0, numbers[2] ?? 1];
  if (step === 0) {
    throw new TemplateRuntimeError("range() arg 3 must not be zero");
  }

  const size = Math.max(Math.ceil((stop - start) / step), 0);
  if (size > MAX_RANGE) {
    throw new SecurityError(`Range too big. The sandbox blocks ranges larger than MAX_RANGE (${MAX_RANGE})`);
  }
  return Array.from({ length: size }, (_, index) => start + index * step);
}

/**
 * Globals every environment starts with
 */
function builtinGlobals(): Map<string, unknown> {
  return new Map<string, unknown>([
    ["range", new NativeFunction("range", rangeGlobal)],
    ["dict", new NativeFunction("dict", ({ kwargs }) => createMapping(kwargs))],
  ]);
}

/**
 * Shared configuration for parsing and rendering templates
 *
 * @example
 * ```typescript
 * const env = new Environment({ keepTrailingNewline: true, extensions: ["do"] });
 * env.fromString("select {{ column }} from t\n").render({ column: "id" });
 * // "select id from t\n"
 * ```
 */
export class Environment {
  readonly keepTrailingNewline: boolean;
  readonly autoescape: boolean;
  readonly extensions: ReadonlySet<EngineExtension>;
  /** Values visible to every template rendered in this environment */
  readonly globals: Map<string, unknown>;
  readonly filters: Map<string, FilterHandler>;
  readonly tests: Map<string, TestHandler>;

  constructor(options: EnvironmentOptions = {}) {
    this.keepTrailingNewline = options.keepTrailingNewline ?? false;
    this.autoescape = options.autoescape ?? false;
    this.extensions = new Set(options.extensions ?? []);
    this.globals = builtinGlobals();
    this.filters = new Map(BUILTIN_FILTERS);
    this.tests = new Map(BUILTIN_TESTS);
  }

  /**
   * Parse source into a syntax tree; throws TemplateSyntaxError
   */
  parse(source: string): TemplateRoot {
    const tokens = tokenize(source, { keepTrailingNewline: this.keepTrailingNewline });
    return parseTokens(tokens, {
      extensions: this.extensions,
      filters: new Set(this.filters.keys()),
      tests: new Set(this.tests.keys()),
    });
  }

  /**
   * Parse source into a renderable template
   */
  fromString(source: string): Template {
    return new Template(this, this.parse(source));
  }
}

/**
 * A parsed template bound to its environment
 */
export class Template {
  constructor(
    private readonly environment: Environment,
    readonly root: TemplateRoot
  ) {}

  render(context: Map<string, unknown> | Record<string, unknown> = {}): string {
    const { scope, evaluator } = this.prepare(context);
    return evaluator.render(this.root.body, scope);
  }

  /**
   * Run the template as a module and return the names it defines at top level
   */
  exports(): Map<string, unknown> {
    const { scope, evaluator } = this.prepare({});
    evaluator.render(this.root.body, scope);
    return scope.own();
  }

  /**
   * The macros among {@link exports}
   */
  macros(): Map<string, Macro> {
    const macros = new Map<string, Macro>();
    for (const [name, value] of this.exports()) {
      if (value instanceof Macro) {
        macros.set(name, value);
      }
    }
    return macros;
  }

  private prepare(context: Map<string, unknown> | Record<string, unknown>): {
    scope: Scope;
    evaluator: Evaluator;
  } {
    const globals = new Scope(null, this.environment.globals);
    const values = new Map<string, unknown>(context instanceof Map ? context : Object.entries(context));
    const scope = new Scope(globals, values).child();
    const evaluator = new Evaluator({
      autoescape: this.environment.autoescape,
      filters: this.environment.filters,
      tests: this.environment.tests,
    });
    return { scope, evaluator };
  }
}
