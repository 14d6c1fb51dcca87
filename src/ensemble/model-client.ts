// src/ensemble/model-client.ts — Single inference endpoint with bounded retry and rolling stats
//
// One logical generate() = up to maxRetries + 1 HTTP attempts. Backoff starts at
// `retryBackoff` seconds and is multiplied by `retryBackoff` after every failure.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { EngineConfig } from "../config.js"
import { EndpointError } from "../errors.js"
import { sleep as defaultSleep, type Sleep } from "../resilience/sleep.js"
import type { EndpointStats, EnsembleMember, ModelResponse } from "./types.js"

export interface EndpointTarget {
  name: string
  url: string
}

export interface ModelClientConfig {
  maxRetries: number          // Default: 3
  retryBackoff: number        // Default: 1.5 (seconds, and the multiplier)
  unhealthyThreshold: number  // Default: 5
  requestTimeoutMs: number    // Default: 30_000
}

export const DEFAULT_MODEL_CLIENT_CONFIG: ModelClientConfig = {
  maxRetries: 3,
  retryBackoff: 1.5,
  unhealthyThreshold: 5,
  requestTimeoutMs: 30_000,
}

export interface ModelClientDeps {
  fetch?: typeof globalThis.fetch
  sleep?: Sleep
  /** Monotonic clock in ms for latency measurement */
  clock?: () => number
}

const GenerateResponseSchema = Type.Object({
  text: Type.Optional(Type.Unknown()),
  response: Type.Optional(Type.Unknown()),
})

/** Pick `text`, falling back to `response`. Returns null when neither is a string. */
export function extractText(body: unknown): string | null {
  if (!Value.Check(GenerateResponseSchema, body)) return null
  const { text, response } = body
  if (typeof text === "string" && text.length > 0) return text
  if (typeof response === "string") return response
  if (typeof text === "string") return text
  return null
}

export class ModelClient implements EnsembleMember {
  readonly name: string
  readonly url: string
  private readonly config: ModelClientConfig
  private readonly fetchFn: typeof globalThis.fetch
  private readonly sleep: Sleep
  private readonly clock: () => number

  private totalCalls = 0
  private successfulCalls = 0
  private errorCount = 0
  private avgLatencyMs = 0

  constructor(endpoint: EndpointTarget, config?: Partial<ModelClientConfig>, deps?: ModelClientDeps) {
    this.name = endpoint.name
    this.url = endpoint.url
    this.config = { ...DEFAULT_MODEL_CLIENT_CONFIG, ...config }
    this.fetchFn = deps?.fetch ?? globalThis.fetch
    this.sleep = deps?.sleep ?? defaultSleep
    this.clock = deps?.clock ?? (() => performance.now())
  }

  /** Run one logical request. Throws the last attempt's error once retries are exhausted. */
  async generate(prompt: string, roundId: string): Promise<ModelResponse> {
    let retries = 0
    let backoffSec = this.config.retryBackoff

    for (;;) {
      const start = this.clock()
      this.totalCalls++
      try {
        const text = await this.attempt(prompt, roundId)
        const latencyMs = this.clock() - start
        this.successfulCalls++
        this.updateLatency(latencyMs)
        return { text, latency_ms: latencyMs }
      } catch (err) {
        this.errorCount++
        if (retries >= this.config.maxRetries) throw err
        retries++
        await this.sleep(backoffSec * 1000)
        backoffSec *= this.config.retryBackoff
      }
    }
  }

  isHealthy(): boolean {
    return this.errorCount < this.config.unhealthyThreshold
  }

  getStats(): EndpointStats {
    return {
      total_calls: this.totalCalls,
      successful_calls: this.successfulCalls,
      error_count: this.errorCount,
      avg_latency_ms: this.avgLatencyMs,
    }
  }

  private async attempt(prompt: string, roundId: string): Promise<string> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs)

    try {
      let res: Response
      try {
        res = await this.fetchFn(this.url, {
          method: "POST",
          headers: { "Content-Type": "application/json", Accept: "application/json" },
          body: JSON.stringify({ prompt, round_id: roundId }),
          signal: controller.signal,
        })
      } catch (err) {
        throw this.transportError(err, controller.signal)
      }

      if (!res.ok) {
        const body = await res.text().catch(() => "")
        throw new EndpointError({
          code: "http_status",
          endpoint: this.name,
          statusCode: res.status,
          message: `HTTP ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`,
        })
      }

      let body: unknown
      try {
        body = await res.json()
      } catch (err) {
        if (controller.signal.aborted) throw this.transportError(err, controller.signal)
        throw new EndpointError({
          code: "malformed_response",
          endpoint: this.name,
          message: "response body is not valid JSON",
        })
      }

      const text = extractText(body)
      if (text === null) {
        throw new EndpointError({
          code: "malformed_response",
          endpoint: this.name,
          message: "response has neither \"text\" nor \"response\" string field",
        })
      }
      return text
    } finally {
      clearTimeout(timeout)
    }
  }

  private transportError(err: unknown, signal: AbortSignal): EndpointError {
    if (signal.aborted) {
      return new EndpointError({
        code: "timeout",
        endpoint: this.name,
        message: `request timed out after ${this.config.requestTimeoutMs}ms`,
      })
    }
    return new EndpointError({
      code: "network_error",
      endpoint: this.name,
      message: err instanceof Error ? err.message : String(err),
    })
  }

  private updateLatency(latestMs: number): void {
    this.avgLatencyMs =
      (this.avgLatencyMs * (this.successfulCalls - 1) + latestMs) / Math.max(this.successfulCalls, 1)
  }
}

/** One client per configured endpoint; health follows the circuit-breaker failure threshold. */
export function createModelClients(
  config: Pick<EngineConfig, "endpoints" | "maxRetries" | "retryBackoff" | "circuitBreaker">,
  deps?: ModelClientDeps,
): ModelClient[] {
  return config.endpoints.map(
    (endpoint) =>
      new ModelClient(
        endpoint,
        {
          maxRetries: config.maxRetries,
          retryBackoff: config.retryBackoff,
          unhealthyThreshold: config.circuitBreaker.maxFailures,
        },
        deps,
      ),
  )
}
