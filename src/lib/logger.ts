import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2,
  silent: 3,
};

/**
 * Leveled logger for generator diagnostics.
 *
 * `--list` output is written with `console.log` and never passes through here.
 */
export class Logger {
  private level: LogLevel = "info";

  configure(config: { level?: LogLevel }): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Per-file progress (gray)
   */
  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.debug(chalk.gray(message));
    }
  }

  /**
   * Run summary (green), shown at info level
   */
  success(message: string): void {
    if (this.isEnabled("info")) {
      console.info(chalk.green(message));
    }
  }

  /**
   * Failure line (red); still shown under --quiet
   */
  error(message: string): void {
    if (this.isEnabled("error")) {
      console.error(chalk.red(message));
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
