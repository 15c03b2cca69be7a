export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Correlates a log line with the HTTP request and the query run that produced it. */
export interface CorrelationContext {
  requestId?: string | null;
  queryId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

type LogFn = (event: string, fields?: LogFields) => void;

export interface BoundLogger {
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const parseConfiguredLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
};

const threshold = LOG_LEVELS.indexOf(parseConfiguredLogLevel(process.env.LOG_LEVEL));

export const isLogLevelEnabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

const sinkFor = (level: LogLevel): ((line: string) => void) => {
  switch (level) {
    case "error":
      return console.error;
    case "warn":
      return console.warn;
    default:
      return console.info;
  }
};

/** Writes one JSON line; correlation ids are always present, null when unknown. */
export const log = (level: LogLevel, event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  sinkFor(level)(
    JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      request_id: context.requestId ?? null,
      query_id: context.queryId ?? null,
      ...fields
    })
  );
};

export const logDebug = (event: string, context: CorrelationContext, fields?: LogFields): void =>
  log("debug", event, context, fields);
export const logInfo = (event: string, context: CorrelationContext, fields?: LogFields): void =>
  log("info", event, context, fields);
export const logWarn = (event: string, context: CorrelationContext, fields?: LogFields): void =>
  log("warn", event, context, fields);
export const logError = (event: string, context: CorrelationContext, fields?: LogFields): void =>
  log("error", event, context, fields);

export const createLogger = (context: CorrelationContext): BoundLogger => ({
  trace: (event, fields) => log("trace", event, context, fields),
  debug: (event, fields) => log("debug", event, context, fields),
  info: (event, fields) => log("info", event, context, fields),
  warn: (event, fields) => log("warn", event, context, fields),
  error: (event, fields) => log("error", event, context, fields)
});
