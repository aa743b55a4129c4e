export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

type Sink = (line: string) => void;

// Everything goes to stderr so stdout carries only the report.
const defaultSink: Sink = (line) => console.error(line);

export function createLogger(level: LogLevel = "info", sink: Sink = defaultSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (at: Exclude<LogLevel, "silent">, message: string) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    sink(`${at.toUpperCase()}: ${message}`);
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = createLogger("silent");
