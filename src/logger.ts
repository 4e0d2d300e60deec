/**
 * Leveled logger for the signer clients.
 *
 * Wraps console with level filtering. The level comes from the constructor
 * or the SIGNER_LOG_LEVEL env var, and defaults to info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelLabels: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

export function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

export class Logger {
  readonly level: LogLevel;
  private threshold: number;
  private scope: string;

  constructor(level?: string, scope = "") {
    this.level = parseLevel(level ?? process.env.SIGNER_LOG_LEVEL);
    this.threshold = levelOrder[this.level];
    this.scope = scope;
  }

  /** Returns a logger at the same level that prefixes lines with `[scope]`. */
  child(scope: string): Logger {
    return new Logger(this.level, scope);
  }

  debug(msg: string, ...args: unknown[]): void { this.log("debug", msg, ...args); }
  info(msg: string, ...args: unknown[]): void  { this.log("info", msg, ...args); }
  warn(msg: string, ...args: unknown[]): void  { this.log("warn", msg, ...args); }
  error(msg: string, ...args: unknown[]): void { this.log("error", msg, ...args); }

  private log(level: LogLevel, msg: string, ...args: unknown[]): void {
    if (levelOrder[level] < this.threshold) return;

    const timestamp = new Date().toISOString();
    const formatted = args.length > 0 ? `${msg} ${args.map(String).join(" ")}` : msg;
    const prefix = this.scope ? `[${this.scope}] ` : "";
    const line = `${timestamp} [${levelLabels[level]}] ${prefix}${formatted}`;

    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
