import { LogFields, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

/**
 * JSON-lines logger. Every line goes to stderr so stdout stays free for
 * command output such as run reports.
 */
export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId, minLevel: this.context.minLevel });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.minLevel ?? "info"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    console.error(JSON.stringify(payload));
  }
}
