/**
 * Logger utility for CLI output
 *
 * Respects --verbose, --quiet, --no-color, --json flags
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /** Enable verbose output (shows debug level) */
  verbose?: boolean;
  /** Minimize output (only show errors and json output) */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Where formatted lines end up
 */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface Logger {
  /** Log debug message (only in verbose mode) */
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Log success message (info level with green checkmark) */
  success(message: string, data?: Record<string, unknown>): void;
  /** Output JSON data directly */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const processSink: LogSink = {
  stdout(line: string): void {
    process.stdout.write(line + "\n");
  },
  stderr(line: string): void {
    process.stderr.write(line + "\n");
  },
};

const plainChalk = new Chalk({ level: 0 });

/**
 * Create a logger writing to the given sink
 */
export function createLogger(
  sink: LogSink = processSink,
  initial: LoggerOptions = {}
): Logger {
  let options: LoggerOptions = {
    verbose: false,
    quiet: false,
    noColor: false,
    json: false,
    ...initial,
  };

  function colors(): ChalkInstance {
    return options.noColor ? plainChalk : chalk;
  }

  function shouldOutput(level: LogLevel): boolean {
    if (options.quiet) {
      return level === "error";
    }
    return level !== "debug" || options.verbose === true;
  }

  function formatText(level: LogLevel, message: string, prefix?: string): string {
    const c = colors();
    switch (level) {
      case "debug":
        return c.gray(`[debug] ${message}`);
      case "info":
        return prefix ? `${prefix} ${message}` : message;
      case "warn":
        return c.yellow(`${c.bold("warning:")} ${message}`);
      case "error":
        return c.red(`${c.bold("error:")} ${message}`);
    }
  }

  function output(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    prefix?: string
  ): void {
    if (!shouldOutput(level)) {
      return;
    }

    if (options.json) {
      const entry: JsonLogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
      };
      if (data) {
        entry.data = data;
      }
      // Always use stdout for JSON
      sink.stdout(JSON.stringify(entry));
      return;
    }

    const line = formatText(level, message, prefix);
    if (level === "error" || level === "warn") {
      sink.stderr(line);
    } else {
      sink.stdout(line);
    }

    if (data && options.verbose) {
      sink.stdout(colors().gray(JSON.stringify(data, null, 2)));
    }
  }

  return {
    debug(message, data): void {
      output("debug", message, data);
    },
    info(message, data): void {
      output("info", message, data);
    },
    warn(message, data): void {
      output("warn", message, data);
    },
    error(message, data): void {
      output("error", message, data);
    },
    success(message, data): void {
      output("info", message, data, colors().green("✓"));
    },
    json(data: unknown): void {
      // JSON output always goes to stdout, regardless of quiet mode
      sink.stdout(JSON.stringify(data, null, options.json ? 0 : 2));
    },
    configure(next: LoggerOptions): void {
      options = { ...options, ...next };
    },
    getOptions(): Readonly<LoggerOptions> {
      return { ...options };
    },
  };
}

/**
 * Default logger instance
 */
export const logger = createLogger();
