export { Logger, parseLogLevel } from "./logger";
export type { LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export { createRunId } from "./runId";
export type { LogFields, LogLevel, MetricCounterName, MetricTimerName } from "./types";
