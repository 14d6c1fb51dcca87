// src/gateway/server.ts — Hono HTTP server: health, Prometheus scrape, engine state

import { createHash, timingSafeEqual } from "node:crypto"
import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { MarketState } from "../engine/market-state.js"
import type { RoundRunner } from "../engine/round-runner.js"
import type { MerkleLogger } from "../ledger/merkle-logger.js"
import type { HealthMonitor } from "../monitoring/health.js"
import { recordStreamHealth, type MetricRegistry } from "../monitoring/metrics.js"
import type { StreamHealthSnapshot } from "../streams/stream-manager.js"

export interface AppOptions {
  health: HealthMonitor
  metrics: MetricRegistry
  runner: RoundRunner
  state: MarketState
  ledger: MerkleLogger
  stream?: { getHealthMetrics(): StreamHealthSnapshot }
  /** Required on /metrics when set */
  metricsBearerToken?: string
  now?: () => number
}

export const SignalUpdateSchema = Type.Object({
  tips: Type.Number({ minimum: 0 }),
  whales: Type.Number({ minimum: 0 }),
  ts: Type.Optional(Type.Integer({ minimum: 0 })),
})

/** Timing-safe string comparison (constant-time even for different lengths) */
function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

export function createApp(options: AppOptions) {
  const app = new Hono()
  const now = options.now ?? Date.now

  // Health endpoint (no auth required)
  app.get("/health", async (c) => {
    const health = await options.health.check()
    return c.json(health, health.status === "unhealthy" ? 503 : 200)
  })

  app.get("/metrics", (c) => {
    const token = options.metricsBearerToken
    if (token) {
      const authHeader = c.req.header("Authorization")
      if (!authHeader) {
        return c.json({ error: "Authorization required" }, 401)
      }
      const presented = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : authHeader
      if (!safeCompare(presented, token)) {
        return c.json({ error: "Invalid token" }, 403)
      }
    }

    if (options.stream) recordStreamHealth(options.metrics, options.stream.getHealthMetrics())
    return c.body(options.metrics.serialize(), 200, { "Content-Type": "text/plain; version=0.0.4; charset=utf-8" })
  })

  app.get("/api/state", (c) => c.json(options.runner.snapshot()))

  app.get("/api/history", (c) => {
    const limit = Number(c.req.query("limit") ?? "20")
    if (!Number.isInteger(limit) || limit < 1) {
      return c.json({ error: "limit must be a positive integer" }, 400)
    }
    return c.json({ rounds: options.runner.getHistory().slice(-limit) })
  })

  app.get("/api/chain/verify", async (c) => {
    const result = await options.ledger.verifyChain()
    return c.json({ ...result, root: options.ledger.getCurrentRoot() })
  })

  // Signal proxies (tips/whales) pushed by an external collector
  app.post("/api/signals", async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400)
    }
    if (!Value.Check(SignalUpdateSchema, body)) {
      const first = Value.Errors(SignalUpdateSchema, body).First()
      return c.json({ error: "Invalid signal update", detail: first ? `${first.path} ${first.message}` : null }, 400)
    }

    const ts = body.ts ?? now()
    options.state.recordSignals(ts, body.tips, body.whales)
    return c.json({ accepted: true, ts })
  })

  return app
}
