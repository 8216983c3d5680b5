import pino from "pino";

type LogContext = Record<string, unknown>;

const base = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "construction-budget-bot" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

function write(level: "debug" | "info" | "warn" | "error", message: string, context?: LogContext) {
  if (context) {
    base[level](context, message);
  } else {
    base[level](message);
  }
}

export const logger = {
  debug: (message: string, context?: LogContext) => write("debug", message, context),
  info: (message: string, context?: LogContext) => write("info", message, context),
  warn: (message: string, context?: LogContext) => write("warn", message, context),
  error: (message: string, context?: LogContext) => write("error", message, context),
};

export function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  return { message: String(error) };
}
