type LogLevel = "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  route?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: CorrelationContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  route: context.route ?? null,
  ...fields
});

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
};

let configuredLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export const setLogLevel = (level: string | undefined): void => {
  configuredLogLevel = parseLogLevel(level);
};

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const emit = (entry: Record<string, unknown>, level: LogLevel): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(entry);
  if (level === "error") {
    console.error(serialized);
    return;
  }
  if (level === "warn") {
    console.warn(serialized);
    return;
  }
  console.info(serialized);
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};

export const logInfo = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("info", event, context, fields), "info");
};

export const logDebug = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("debug", event, context, fields), "debug");
};

export const logWarn = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("warn", event, context, fields), "warn");
};

export const logError = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("error", event, context, fields), "error");
};
