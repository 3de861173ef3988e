import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export type OutputBackend = "csv" | "postgres";

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  cursorSecret: string;
  cursorVerificationSecrets: string[];
  controlsPath: string;
  transactionsPath: string;
  outputDir: string;
  outputBackend: OutputBackend;
  postgresUrl?: string;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  listDefaultLimit: number;
  listMaxLimit: number;
  maxBatchSize: number;
}

export const DEFAULT_API_KEY = "dev_rc_key";
const DEFAULT_CURSOR_SECRET = "dev_cursor_secret_change_me";

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("RC_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("RC_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const configuredCursorSecrets = parseStringListEnv("RC_CURSOR_SECRETS", 16, 10);
  const fallbackCursorSecret = parseStringEnv("RC_CURSOR_SECRET", DEFAULT_CURSOR_SECRET, 16);
  const cursorSecret = configuredCursorSecrets?.[0] ?? fallbackCursorSecret;
  const cursorVerificationSecrets = configuredCursorSecrets ?? [fallbackCursorSecret];
  const controlsPath = parseStringEnv("RC_CONTROLS_PATH", "controls/controls.yaml", 1);
  const transactionsPath = parseStringEnv("RC_TRANSACTIONS_PATH", "data/combined_transactions.csv", 1);
  const outputDir = parseStringEnv("RC_OUTPUT_DIR", "data", 1);
  const outputBackend = parseEnumEnv("RC_OUTPUT_BACKEND", ["csv", "postgres"] as const, "csv");
  const postgresUrl = parseOptionalStringEnv("RC_POSTGRES_URL", 12);
  const logLevel = parseEnumEnv("RC_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("RC_METRICS_ENABLED", true);
  const listDefaultLimit = parseIntegerEnv("RC_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const listMaxLimit = parseIntegerEnv("RC_LIST_MAX_LIMIT", 500, 1, 5000);
  const maxBatchSize = parseIntegerEnv("RC_MAX_BATCH_SIZE", 50_000, 1, 1_000_000);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "RC_API_KEYS" : "RC_API_KEY",
      "must not include default key value in production",
    );
  }
  if (process.env.NODE_ENV === "production" && cursorSecret === DEFAULT_CURSOR_SECRET) {
    throw invalidConfig("RC_CURSOR_SECRET", "must not use default value in production");
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("RC_LIST_DEFAULT_LIMIT", "must be lower or equal to RC_LIST_MAX_LIMIT");
  }
  if (outputBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("RC_POSTGRES_URL", "is required when RC_OUTPUT_BACKEND is postgres");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    cursorSecret,
    cursorVerificationSecrets,
    controlsPath,
    transactionsPath,
    outputDir,
    outputBackend,
    logLevel,
    metricsEnabled,
    listDefaultLimit,
    listMaxLimit,
    maxBatchSize,
    ...(postgresUrl ? { postgresUrl } : {}),
  };
}
