export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/** Process-wide override, set once the CLI has parsed its flags */
let overrideLevel: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  overrideLevel = level;
}

class ConsoleLogger implements Logger {
  private readonly fixedLevel: LogLevel | undefined;
  private readonly prefix: string;

  constructor(prefix: string = "", level?: LogLevel) {
    this.prefix = prefix;
    this.fixedLevel = level;
  }

  private get level(): LogLevel {
    return this.fixedLevel ?? overrideLevel ?? resolveLogLevel();
  }

  private shouldLog(level: LogLevel): boolean {
    const current = this.level;
    return LEVELS.indexOf(current) <= LEVELS.indexOf(level) && current !== "silent";
  }

  // Progress goes to stderr so stdout stays clean for --json output
  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

/**
 * Resolves the effective level: explicit argument, then LOG_LEVEL,
 * then silent under NODE_ENV=test, then info.
 */
export function resolveLogLevel(
  level?: LogLevel,
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = env["LOG_LEVEL"];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return env["NODE_ENV"] === "test" ? "silent" : "info";
}

/**
 * Creates a prefixed logger. Without an explicit level it follows
 * setLogLevel, then the environment, at the time of each call.
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level);
}

export const logger = createLogger("[app-commit] ");
