import fs from "node:fs";
import path from "node:path";
import { parseLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  sourcesPath: "config/sources.yml",
  historyPath: "data/processed/opportunities.ndjson",
  userAgent: "bid-triage/0.1 (opportunity crawler)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  maxFetchAttempts: 3,
  retryBaseDelayMs: 500,
  sourceConcurrency: 1,
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(parsed);
}

function pickOverrides(raw: object): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "sourcesPath":
      case "historyPath":
      case "userAgent":
        if (typeof value === "string") overrides[key] = value;
        break;
      case "ignoreHttpsErrors":
        if (typeof value === "boolean") overrides[key] = value;
        break;
      case "requestTimeoutMs":
      case "maxFetchAttempts":
      case "retryBaseDelayMs":
      case "sourceConcurrency":
        if (typeof value === "number" && Number.isFinite(value)) overrides[key] = value;
        break;
      case "logLevel":
        if (typeof value === "string") overrides[key] = parseLogLevel(value, DEFAULT_CONFIG.logLevel);
        break;
      default:
        break;
    }
  }
  return overrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    sourcesPath: env.SOURCES_PATH ?? merged.sourcesPath,
    historyPath: env.HISTORY_PATH ?? merged.historyPath,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxFetchAttempts: Math.max(1, toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts)),
    retryBaseDelayMs: Math.max(0, toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs)),
    sourceConcurrency: Math.max(1, toInt(env.SOURCE_CONCURRENCY, merged.sourceConcurrency)),
    logLevel: parseLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
