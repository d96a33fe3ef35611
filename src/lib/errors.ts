/**
 * Base error class for all sqlweave errors
 */
export class WeaveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "WeaveError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or reporting
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for configuration issues (unknown templater, malformed sections)
 */
export class ConfigError extends WeaveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Fatal failure while templating a document
 */
export class TemplaterError extends WeaveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TEMPLATER_ERROR", context);
    this.name = "TemplaterError";
  }
}

/**
 * Error for malformed template syntax
 */
export class TemplateSyntaxError extends WeaveError {
  constructor(
    message: string,
    public readonly lineno: number,
    context?: Record<string, unknown>
  ) {
    super(`${message} (line ${lineno})`, "TEMPLATE_SYNTAX_ERROR", { ...context, lineno });
    this.name = "TemplateSyntaxError";
  }
}

/**
 * Error raised while evaluating a parsed template
 */
export class TemplateRuntimeError extends WeaveError {
  constructor(message: string, context?: Record<string, unknown>, code = "TEMPLATE_RUNTIME_ERROR") {
    super(message, code, context);
    this.name = "TemplateRuntimeError";
  }
}

/**
 * Error for operations on an undefined template value
 */
export class UndefinedError extends TemplateRuntimeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "UNDEFINED_ERROR");
    this.name = "UndefinedError";
  }
}

/**
 * Error for template code reaching outside the sandbox
 */
export class SecurityError extends TemplateRuntimeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "SECURITY_ERROR");
    this.name = "SecurityError";
  }
}

/**
 * Get the message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
