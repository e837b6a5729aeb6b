import { getConfigValue } from "../settings/config";

export enum LogLevel {
  Debug = 0,
  Warning = 1,
  Error = 2,
  None = 3,
}

const levelLabels: Record<LogLevel, string> = {
  [LogLevel.Debug]: "DEBUG",
  [LogLevel.Warning]: "WARN",
  [LogLevel.Error]: "ERROR",
  [LogLevel.None]: "",
};

/**
 * Library diagnostics. Everything goes to stderr so that a program embedding
 * the taggers keeps stdout to itself.
 */
export class Logger {
  constructor(private source: string, private minLogLevel: LogLevel) { }

  log(logLevel: LogLevel, message: string, ...args: unknown[]): void {
    if (logLevel === LogLevel.None || logLevel < this.minLogLevel) return;

    console.error(`[${new Date().toJSON()}]`, `[TAGFILL:${this.source}]`, levelLabels[logLevel], message, ...args);
  }

  logDebug(message: string, ...args: unknown[]) {
    // Debug output stays off unless TAGFILL_DEBUG is explicitly "true"
    if (!getConfigValue("debug-logging")) return;

    this.log(LogLevel.Debug, message, ...args);
  }

  logWarn(message: string, ...args: unknown[]) {
    this.log(LogLevel.Warning, message, ...args);
  }

  logError(message: string, ...args: unknown[]) {
    this.log(LogLevel.Error, message, ...args);
  }

  static create(name: string, minLogLevel: LogLevel = LogLevel.Warning) {
    return new Logger(name, minLogLevel);
  }
}
