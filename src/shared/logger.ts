export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

interface LogPayload {
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Returns a logger that merges `bound` into every entry's context.
   * Per-call context wins on key collisions.
   */
  child(bound: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function normalizeLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return "info";
  }

  const normalized = value.toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }

  // JSON.stringify throws on bigint; amounts and gas prices are bigints here.
  if (typeof value === "bigint") {
    return value.toString();
  }

  return value;
}

function serializeContext(context: LogContext | undefined): LogContext | undefined {
  if (!context) {
    return undefined;
  }

  const serialized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    serialized[key] = serializeValue(value);
  }

  return serialized;
}

function writeLog(level: LogLevel, scope: string, payload: LogPayload): void {
  const threshold = normalizeLogLevel(process.env.LOG_LEVEL);
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold]) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scope,
    message: payload.message,
    ...(payload.context ? { context: serializeContext(payload.context) } : {})
  });

  if (level === "error") {
    process.stderr.write(`${line}\n`);
    return;
  }

  process.stdout.write(`${line}\n`);
}

function mergeContext(bound: LogContext | undefined, context: LogContext | undefined): LogContext | undefined {
  if (!bound) {
    return context;
  }
  return { ...bound, ...context };
}

function buildLogger(scope: string, bound?: LogContext): Logger {
  return {
    debug(message, context) {
      writeLog("debug", scope, { message, context: mergeContext(bound, context) });
    },
    info(message, context) {
      writeLog("info", scope, { message, context: mergeContext(bound, context) });
    },
    warn(message, context) {
      writeLog("warn", scope, { message, context: mergeContext(bound, context) });
    },
    error(message, context) {
      writeLog("error", scope, { message, context: mergeContext(bound, context) });
    },
    child(extra) {
      return buildLogger(scope, { ...bound, ...extra });
    }
  };
}

export function createLogger(scope: string): Logger {
  return buildLogger(scope);
}
