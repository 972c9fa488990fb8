import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const DEFAULT_API_KEY = "dev_payments_key";
const DEFAULT_GATEWAY_SECRET = "dev_gateway_secret_change_me";

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

function parseNumberEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw invalidConfig(name, `must be a number between ${min} and ${max}`);
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

function parseUrlEnv(name: string, defaultValue: string): string {
  const value = parseStringEnv(name, defaultValue, 8);
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw invalidConfig(name, "must use http or https");
    }
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw invalidConfig(name, "must be an absolute URL");
  }
  return value.replace(/\/+$/, "");
}

export type GatewayBackend = "mock" | "cinetpay";

export interface GatewayConfig {
  backend: GatewayBackend;
  baseUrl: string;
  apiKey: string;
  siteId: string;
  secretKey: string;
  timeoutMs: number;
  signatureHeader: string;
  language: string;
}

export interface ReconciliationConfig {
  enabled: boolean;
  maxAttempts: number;
  firstCheckDelayMs: number;
  pollIntervalMs: number;
  backoffFactor: number;
  maxBackoffMs: number;
  leaseMs: number;
  batchSize: number;
  tickIntervalMs: number;
  errorBackoffMs: number;
  rebuildOnStart: boolean;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  apiKeys: string[];
  publicBaseUrl: string;
  metricsEnabled: boolean;
  ledgerBackend: "memory" | "postgres";
  queueBackend: "memory" | "redis";
  eventBusBackend: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  queueKeyPrefix: string;
  eventStreamKey: string;
  gateway: GatewayConfig;
  reconciliation: ReconciliationConfig;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv("LOG_LEVEL", LOG_LEVELS, "info");
  const configuredApiKeys = parseStringListEnv("PAYMENTS_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("PAYMENTS_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const publicBaseUrl = parseUrlEnv("PAYMENTS_PUBLIC_BASE_URL", "http://localhost:8080");
  const metricsEnabled = parseBooleanEnv("PAYMENTS_METRICS_ENABLED", true);
  const ledgerBackend = parseEnumEnv("PAYMENTS_LEDGER_BACKEND", ["memory", "postgres"] as const, "memory");
  const queueBackend = parseEnumEnv("PAYMENTS_QUEUE_BACKEND", ["memory", "redis"] as const, "memory");
  const eventBusBackend = parseEnumEnv("PAYMENTS_EVENT_BUS_BACKEND", ["memory", "redis"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("PAYMENTS_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PAYMENTS_REDIS_URL", 8);
  const queueKeyPrefix = parseStringEnv("PAYMENTS_QUEUE_KEY_PREFIX", "payments:reconciliation", 3);
  const eventStreamKey = parseStringEnv("PAYMENTS_EVENT_STREAM_KEY", "payments:events", 3);

  const gatewayBackend = parseEnumEnv("GATEWAY_BACKEND", ["mock", "cinetpay"] as const, "mock");
  const gateway: GatewayConfig = {
    backend: gatewayBackend,
    baseUrl: parseUrlEnv(
      "GATEWAY_BASE_URL",
      gatewayBackend === "cinetpay" ? "https://api-checkout.cinetpay.com" : "http://localhost:8080/mock-gateway",
    ),
    apiKey: parseStringEnv("GATEWAY_API_KEY", gatewayBackend === "cinetpay" ? "" : "dev_gateway_api_key", 0),
    siteId: parseStringEnv("GATEWAY_SITE_ID", gatewayBackend === "cinetpay" ? "" : "000000", 0),
    secretKey: parseStringEnv("GATEWAY_SECRET_KEY", DEFAULT_GATEWAY_SECRET, 16),
    timeoutMs: parseIntegerEnv("GATEWAY_TIMEOUT_MS", 10_000, 100, 120_000),
    signatureHeader: parseStringEnv("GATEWAY_SIGNATURE_HEADER", "x-token", 1).toLowerCase(),
    language: parseEnumEnv("GATEWAY_LANGUAGE", ["fr", "en"] as const, "fr"),
  };

  const reconciliation: ReconciliationConfig = {
    enabled: parseBooleanEnv("RECONCILIATION_ENABLED", true),
    maxAttempts: parseIntegerEnv("RECONCILIATION_MAX_ATTEMPTS", 20, 1, 1000),
    firstCheckDelayMs: parseIntegerEnv("RECONCILIATION_FIRST_CHECK_DELAY_MS", 15_000, 0, 86_400_000),
    pollIntervalMs: parseIntegerEnv("RECONCILIATION_POLL_INTERVAL_MS", 15_000, 100, 86_400_000),
    backoffFactor: parseNumberEnv("RECONCILIATION_BACKOFF_FACTOR", 1, 1, 10),
    maxBackoffMs: parseIntegerEnv("RECONCILIATION_MAX_BACKOFF_MS", 3_600_000, 100, 86_400_000),
    leaseMs: parseIntegerEnv("RECONCILIATION_LEASE_MS", 60_000, 1000, 3_600_000),
    batchSize: parseIntegerEnv("RECONCILIATION_BATCH_SIZE", 10, 1, 1000),
    tickIntervalMs: parseIntegerEnv("RECONCILIATION_TICK_INTERVAL_MS", 15_000, 10, 3_600_000),
    errorBackoffMs: parseIntegerEnv("RECONCILIATION_ERROR_BACKOFF_MS", 30_000, 10, 3_600_000),
    rebuildOnStart: parseBooleanEnv("RECONCILIATION_REBUILD_ON_START", false),
  };

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "PAYMENTS_API_KEYS" : "PAYMENTS_API_KEY",
      "must not include default key value in production",
    );
  }
  if (process.env.NODE_ENV === "production" && gateway.secretKey === DEFAULT_GATEWAY_SECRET) {
    throw invalidConfig("GATEWAY_SECRET_KEY", "must not use default value in production");
  }
  if (gateway.backend === "cinetpay") {
    if (gateway.apiKey.length === 0) {
      throw invalidConfig("GATEWAY_API_KEY", "is required when GATEWAY_BACKEND is cinetpay");
    }
    if (gateway.siteId.length === 0) {
      throw invalidConfig("GATEWAY_SITE_ID", "is required when GATEWAY_BACKEND is cinetpay");
    }
  }
  if (reconciliation.pollIntervalMs > reconciliation.maxBackoffMs) {
    throw invalidConfig(
      "RECONCILIATION_POLL_INTERVAL_MS",
      "must be lower or equal to RECONCILIATION_MAX_BACKOFF_MS",
    );
  }
  if (ledgerBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PAYMENTS_POSTGRES_URL", "is required when the postgres ledger backend is enabled");
  }
  if ((queueBackend === "redis" || eventBusBackend === "redis") && !redisUrl) {
    throw invalidConfig("PAYMENTS_REDIS_URL", "is required when redis-backed runtime features are enabled");
  }

  return {
    host,
    port,
    logLevel,
    apiKeys,
    publicBaseUrl,
    metricsEnabled,
    ledgerBackend,
    queueBackend,
    eventBusBackend,
    queueKeyPrefix,
    eventStreamKey,
    gateway,
    reconciliation,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
