// Crisis Relay - Console logging
//
// Components take an optional Logger so tests can pass silent vi.fn() loggers.
// Transcripts, coordinates and audio never go through info-level logs.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "INFO" | "WARN" | "ERROR";

export function formatLogLine(level: LogLevel, component: string, message: string): string {
  return `[${level}] [${component}] ${message}`;
}

export function createConsoleLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(formatLogLine("INFO", component, msg), ...args),
    warn: (msg, ...args) => console.warn(formatLogLine("WARN", component, msg), ...args),
    error: (msg, ...args) => console.error(formatLogLine("ERROR", component, msg), ...args),
  };
}
