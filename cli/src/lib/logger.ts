interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
}

type Level = "info" | "warn";

class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  private write(level: Level, message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;

    const sink = level === "warn" ? console.warn : console.log;
    if (this.options.json) {
      sink(JSON.stringify({ level, message, ...data }));
      return;
    }

    sink(message);
    if (data) {
      sink(data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  /** Errors are printed even in quiet mode. */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message } : { error };
      console.error(JSON.stringify({ level: "error", message, ...errorData }));
      return;
    }

    console.error(error instanceof Error ? `${message} ${error.message}` : message);
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }
}

export const logger = new Logger();
