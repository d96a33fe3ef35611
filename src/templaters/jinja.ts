import { MacroSectionSchema } from "../config/schema.js";
import { readTemplaterSection } from "../config/config.js";
import { locateIdentifier } from "../core/position.js";
import { fatalViolation, undefinedVariableViolation } from "../core/violation.js";
import { Environment, type Template } from "../engine/environment.js";
import { findNameReferences, findUndeclaredVariables } from "../engine/analysis.js";
import { describeError } from "../lib/errors.js";
import { ok, err, type Result } from "../lib/result.js";
import { logger } from "../lib/logger.js";

import { ContextBuilder } from "./context.js";

import type { ConfigSource } from "../config/config.js";
import type { TemplaterViolation } from "../core/violation.js";
import type { Macro } from "../engine/runtime.js";
import type { TemplateContext } from "./context.js";
import type { Templater, TemplaterOptions, TemplaterOutput } from "./types.js";

const log = logger.child("[jinja]");

/**
 * Renders documents with the sandboxed Jinja-style engine.
 *
 * Each `process` call builds a fresh environment, loads the macros configured
 * under `templater.jinja.macros`, reports every read of an undefined variable
 * and renders the document against the template context.
 */
export class JinjaTemplater implements Templater {
  readonly name = "jinja";
  private readonly contextBuilder: ContextBuilder;

  constructor(options: TemplaterOptions = {}) {
    this.contextBuilder = new ContextBuilder(this.name, options.overrideContext);
  }

  buildContext(filename?: string, config?: ConfigSource): TemplateContext {
    return this.contextBuilder.build(filename, config);
  }

  process(text: string, filename?: string, config?: ConfigSource): TemplaterOutput {
    const env = this.createEnvironment();

    const macros = this.extractMacros(env, config);
    if (!macros.success) {
      return { output: null, violations: [fatalViolation(macros.error)] };
    }
    for (const [name, macro] of macros.data) {
      env.globals.set(name, macro);
    }

    let template: Template;
    try {
      template = env.fromString(text);
    } catch (error) {
      log.debug(`Parse failure in ${filename ?? "<string>"}: ${describeError(error)}`);
      return {
        output: null,
        violations: [fatalViolation(`Failure in parsing template: ${describeError(error)}`)],
      };
    }

    const context = this.buildContext(filename, config);
    const violations = this.findUndefinedVariables(template, text, context, env);

    try {
      const output = template.render(context);
      log.debug(`Rendered ${filename ?? "<string>"} with ${violations.length} undefined variable(s)`);
      return { output, violations };
    } catch (error) {
      violations.push(
        fatalViolation(
          `Unrecoverable failure in templating: ${describeError(error)}. Have you configured your variables?`
        )
      );
      return { output: null, violations };
    }
  }

  equalVariant(other: Templater): boolean {
    return other instanceof JinjaTemplater;
  }

  private createEnvironment(): Environment {
    return new Environment({ keepTrailingNewline: true, autoescape: false, extensions: ["do"] });
  }

  /**
   * Load every macro defined in the configured macro templates
   */
  private extractMacros(env: Environment, config?: ConfigSource): Result<Map<string, Macro>, string> {
    const sources = readTemplaterSection(config, this.name, "macros", MacroSectionSchema);
    const macros = new Map<string, Macro>();

    for (const [key, source] of Object.entries(sources)) {
      try {
        for (const [name, macro] of env.fromString(source).macros()) {
          macros.set(name, macro);
        }
      } catch (error) {
        return err(`Failure in loading macro '${key}': ${describeError(error)}`);
      }
    }

    if (macros.size > 0) {
      log.debug(`Loaded macros: ${[...macros.keys()].join(", ")}`);
    }
    return ok(macros);
  }

  private findUndefinedVariables(
    template: Template,
    source: string,
    context: TemplateContext,
    env: Environment
  ): TemplaterViolation[] {
    const undefinedNames = new Set(
      [...findUndeclaredVariables(template.root)].filter((name) => !context.has(name) && !env.globals.has(name))
    );
    if (undefinedNames.size === 0) {
      return [];
    }

    return findNameReferences(template.root, undefinedNames).map((reference) =>
      undefinedVariableViolation(reference.name, locateIdentifier(source, reference.lineno, reference.name))
    );
  }
}
