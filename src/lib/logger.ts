import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Simple logger with colored output
 *
 * Child loggers share their root's level, so configuring the global logger
 * also affects every module-level child created before it.
 */
export class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private root: Logger | null = null;

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      if (this.root) {
        this.root.configure({ level: config.level });
      } else {
        this.level = config.level;
      }
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  /**
   * Current minimum level
   */
  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.level;
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  /**
   * Format a message with optional prefix
   */
  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  /**
   * Info level logging (default color)
   */
  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.format(message), ...args);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.root = this.root ?? this;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 *
 * `SQLWEAVE_LOG_LEVEL` sets the initial level; library code stays at warn otherwise.
 */
export const logger = new Logger();

const envLevel = process.env["SQLWEAVE_LOG_LEVEL"];
logger.configure({ level: envLevel !== undefined && isLogLevel(envLevel) ? envLevel : "warn" });
