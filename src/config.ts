// src/config.ts — Configuration loader from environment variables

import { ConfigError } from "./errors.js"
import type { EndpointTarget } from "./ensemble/model-client.js"

export interface EngineConfig {
  // Feed
  symbol: string
  streamUrl: string
  histPoints: number
  trendingSource: string

  // Rounds
  roundIntervalMs: number
  roundTimeoutMs: number
  endpoints: EndpointTarget[]
  maxRetries: number
  retryBackoff: number

  /** Stream connection breaker */
  circuitBreaker: {
    maxFailures: number
    timeoutMs: number
  }

  // Ledger
  dataRoot: string
  archiveCap: number
  backupDir: string | undefined
  backupIntervalMs: number

  // Gateway
  port: number
  host: string
  metricsBearerToken: string | undefined

  alertWebhook: string | undefined
}

export const DEFAULT_ENDPOINTS =
  "llama3_8b=http://llama3-8b:8001/generate,mistral_7b=http://mistral-7b:8002/generate"

export const DEFAULT_TRENDING_SOURCE = "https://arxiv.org/list/cs.AI/recent"

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, key: string, fallback: string, min = 0): number {
  const raw = env[key] ?? fallback
  const value = Number(raw)
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new ConfigError(key, `must be a valid integer (got "${raw}")`)
  }
  if (value < min) {
    throw new ConfigError(key, `must be >= ${min} (got ${value})`)
  }
  return value
}

function parseFloatEnv(env: Env, key: string, fallback: string, min = 0): number {
  const raw = env[key] ?? fallback
  const value = Number(raw)
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(key, `must be a valid number (got "${raw}")`)
  }
  if (value < min) {
    throw new ConfigError(key, `must be >= ${min} (got ${value})`)
  }
  return value
}

function parseUrl(key: string, raw: string, protocols: string[]): string {
  let url: URL
  try {
    url = new URL(raw)
  } catch {
    throw new ConfigError(key, `must be a valid URL (got "${raw}")`)
  }
  if (!protocols.includes(url.protocol)) {
    throw new ConfigError(key, `must use ${protocols.join(" or ")} (got "${url.protocol}")`)
  }
  return raw
}

/** `name=url,name=url` → endpoint list in declaration order. Names must be unique. */
export function parseEndpoints(raw: string, key = "MODEL_ENDPOINTS"): EndpointTarget[] {
  const endpoints: EndpointTarget[] = []
  const seen = new Set<string>()
  for (const part of raw.split(",").map((p) => p.trim()).filter((p) => p.length > 0)) {
    const eq = part.indexOf("=")
    const name = eq > 0 ? part.slice(0, eq).trim() : ""
    if (!name) throw new ConfigError(key, `entry "${part}" must be name=url`)
    if (seen.has(name)) throw new ConfigError(key, `duplicate endpoint name "${name}"`)
    seen.add(name)
    endpoints.push({ name, url: parseUrl(key, part.slice(eq + 1).trim(), ["http:", "https:"]) })
  }
  if (endpoints.length === 0) throw new ConfigError(key, "must name at least one endpoint")
  return endpoints
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const symbol = (env.SYMBOL ?? "btcusdt").toLowerCase()
  const streamUrl = parseUrl(
    "STREAM_URL",
    env.STREAM_URL ?? `wss://stream.binance.com:9443/ws/${symbol}@trade`,
    ["ws:", "wss:"],
  )
  const alertWebhook = env.ALERT_WEBHOOK
    ? parseUrl("ALERT_WEBHOOK", env.ALERT_WEBHOOK, ["http:", "https:"])
    : undefined

  return {
    symbol,
    streamUrl,
    histPoints: parseIntEnv(env, "HIST_POINTS", "360", 1),
    trendingSource: env.TRENDING_SOURCE ?? DEFAULT_TRENDING_SOURCE,

    roundIntervalMs: parseIntEnv(env, "BATCH_SEC", "30", 1) * 1000,
    roundTimeoutMs: parseIntEnv(env, "ROUND_TIMEOUT_SEC", "120", 1) * 1000,
    endpoints: parseEndpoints(env.MODEL_ENDPOINTS ?? DEFAULT_ENDPOINTS),
    maxRetries: parseIntEnv(env, "MAX_RETRIES", "3"),
    retryBackoff: parseFloatEnv(env, "RETRY_BACKOFF", "1.5"),

    circuitBreaker: {
      maxFailures: parseIntEnv(env, "CB_FAILURES", "5", 1),
      timeoutMs: parseIntEnv(env, "CB_TIMEOUT", "60", 1) * 1000,
    },

    dataRoot: env.DATA_ROOT ?? "./data",
    archiveCap: parseIntEnv(env, "ARCHIVE_CAP", "12000", 1),
    backupDir: env.BACKUP_DIR || undefined,
    backupIntervalMs: parseIntEnv(env, "BACKUP_INTERVAL_SEC", "3600", 1) * 1000,

    port: parseIntEnv(env, "PORT", "9090"),
    host: env.HOST ?? "0.0.0.0",
    metricsBearerToken: env.METRICS_BEARER_TOKEN || undefined,

    alertWebhook,
  }
}
