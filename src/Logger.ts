import { type LogLevelName, loadConfiguration } from "./Configuration.ts";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "",
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.SILENT]: "",
};

const RESET_COLOR = "\x1b[0m";

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Options overriding the configured logging settings.
 */
export interface LoggerOptions {
  level?: LogLevelName;
  colorize?: boolean;
  /** Receives every formatted line instead of the console */
  write?: (level: LogLevel, line: string) => void;
}

/**
 * Leveled console logger tagged with a context name.
 */
export class Logger {
  readonly #context: string;
  readonly #level: LogLevel;
  readonly #colorize: boolean;
  readonly #write: (level: LogLevel, line: string) => void;

  constructor(context: string, options: LoggerOptions = {}) {
    const logging = options.level !== undefined &&
        options.colorize !== undefined
      ? { level: options.level, colorize: options.colorize }
      : loadConfiguration().logging;

    this.#context = context;
    this.#level = LEVELS_BY_NAME[options.level ?? logging.level];
    this.#colorize = options.colorize ?? logging.colorize;
    this.#write = options.write ?? writeToConsole;
  }

  get context(): string {
    return this.#context;
  }

  debug(message: string, meta?: unknown): void {
    this.#log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.#log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.#log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.#log(LogLevel.ERROR, message, meta);
  }

  #log(level: LogLevel, message: string, meta?: unknown): void {
    if (level < this.#level) {
      return;
    }

    const timestamp = new Date().toISOString();
    const levelName = LOG_LEVEL_NAMES[level].padEnd(5);
    const contextStr = this.#context ? `[${this.#context}]` : "";

    let line = this.#colorize
      ? `${LOG_LEVEL_COLORS[level]}${timestamp} ${levelName}${RESET_COLOR} ${contextStr} ${message}`
      : `${timestamp} ${levelName} ${contextStr} ${message}`;

    if (meta !== undefined) {
      line += ` ${JSON.stringify(meta)}`;
    }

    this.#write(level, line);
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
    default:
      console.log(line);
      break;
  }
}

/**
 * Creates a logger for the given context.
 */
export function createLogger(
  context: string,
  options?: LoggerOptions,
): Logger {
  return new Logger(context, options);
}
