import { LogLevel } from "../observability/types";

export interface AppConfig {
  sourcesPath: string;
  historyPath: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxFetchAttempts: number;
  retryBaseDelayMs: number;
  sourceConcurrency: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
