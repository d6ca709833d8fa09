import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Leveled console logger. Children share their parent's level, so
 * `configure({ logLevel })` reaches every module logger at once.
 */
export class Logger {
  private constructor(
    private readonly root: { level: LogLevel },
    private readonly prefix: string,
  ) {}

  static create(level: LogLevel = "warn"): Logger {
    return new Logger({ level }, "");
  }

  get level(): LogLevel {
    return this.root.level;
  }

  setLevel(level: LogLevel): void {
    this.root.level = level;
  }

  child(prefix: string): Logger {
    return new Logger(this.root, this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.root.level];
  }

  private format(tag: string, message: string): string {
    return this.prefix ? `[${tag}] ${this.prefix}: ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    console.log(chalk.gray(this.format("DEBUG", message)));
    if (data) console.log(chalk.gray(JSON.stringify(data)));
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    console.log(chalk.blue(this.format("INFO", message)));
    if (data) console.log(chalk.blue(JSON.stringify(data)));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow(this.format("WARN", message)));
    if (data) console.warn(chalk.yellow(JSON.stringify(data)));
  }

  error(message: string, error?: Error): void {
    if (!this.enabled("error")) return;
    console.error(chalk.red(this.format("ERROR", message)));
    if (error) console.error(chalk.red(error.stack ?? error.message));
  }
}

export const logger = Logger.create();
