const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CorrelationContext {
  requestId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

export type LogFn = (event: string, context: CorrelationContext, fields?: LogFields) => void;

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

const minimumLevel = LOG_LEVELS.indexOf(parseLogLevel(process.env.LOG_LEVEL));

const writers: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

const createLogFn =
  (level: LogLevel): LogFn =>
  (event, context, fields = {}) => {
    if (LOG_LEVELS.indexOf(level) < minimumLevel) {
      return;
    }
    writers[level](
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        request_id: context.requestId ?? null,
        ...fields
      })
    );
  };

export const logDebug = createLogFn("debug");
export const logInfo = createLogFn("info");
export const logWarn = createLogFn("warn");
export const logError = createLogFn("error");
