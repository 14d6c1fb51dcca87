// tests/gateway/server.test.ts — HTTP routes via app.request()

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { createApp, type AppOptions } from "../../src/gateway/server.js"
import { MarketState } from "../../src/engine/market-state.js"
import { RoundRunner } from "../../src/engine/round-runner.js"
import { EnsembleOrchestrator } from "../../src/ensemble/orchestrator.js"
import { MerkleLogger } from "../../src/ledger/merkle-logger.js"
import { HealthMonitor } from "../../src/monitoring/health.js"
import { createEngineMetrics } from "../../src/monitoring/metrics.js"
import type { StreamHealthSnapshot } from "../../src/streams/stream-manager.js"

let dir: string

async function makeOptions(overrides?: Partial<AppOptions>): Promise<AppOptions> {
  const state = new MarketState("btcusdt", 10, "https://example.org/trending")
  const ledger = new MerkleLogger(join(dir, "rounds"))
  await ledger.init()
  const metrics = createEngineMetrics()
  const orchestrator = new EnsembleOrchestrator([
    {
      name: "a",
      generate: async () => ({ text: "TRADE: x", latency_ms: 5 }),
      getStats: () => ({ total_calls: 0, successful_calls: 0, error_count: 0, avg_latency_ms: 0 }),
      isHealthy: () => true,
    },
  ])
  const runner = new RoundRunner({ state, orchestrator, ledger, metrics })
  return { health: new HealthMonitor(), metrics, runner, state, ledger, now: () => 1_700_000_000_000, ...overrides }
}

const STREAM: StreamHealthSnapshot = {
  running: true,
  message_count: 7,
  error_count: 1,
  reconnect_count: 2,
  current_downtime: 0,
  total_downtime: 0,
  last_message_time: 1_700_000_000_000,
  last_error: null,
  circuit_breaker_state: "CLOSED",
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "champ-gateway-"))
  vi.spyOn(console, "log").mockImplementation(() => {})
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe("GET /health", () => {
  it("returns 200 while healthy", async () => {
    const options = await makeOptions()
    options.health.registerHealthCheck("ledger", () => ({ status: "ok" }))

    const res = await createApp(options).request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: "healthy", services: { ledger: { status: "ok" } } })
  })

  it("returns 503 when a service is down", async () => {
    const options = await makeOptions()
    options.health.registerHealthCheck("stream", () => ({ status: "down" }))

    const res = await createApp(options).request("/health")

    expect(res.status).toBe(503)
  })
})

describe("GET /metrics", () => {
  it("serves the registry in Prometheus text format", async () => {
    const app = createApp(await makeOptions({ stream: { getHealthMetrics: () => STREAM } }))

    const res = await app.request("/metrics")

    expect(res.status).toBe(200)
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8")
    const text = await res.text()
    expect(text).toContain("# TYPE champ_rounds_total counter")
    expect(text).toContain("champ_stream_messages_total 7")
    expect(text).toContain('champ_circuit_state{state="CLOSED"} 1')
  })

  it("requires the bearer token when configured", async () => {
    const app = createApp(await makeOptions({ metricsBearerToken: "test-secret" }))

    expect((await app.request("/metrics")).status).toBe(401)
    expect((await app.request("/metrics", { headers: { Authorization: "Bearer wrong" } })).status).toBe(403)
    expect((await app.request("/metrics", { headers: { Authorization: "Bearer test-secret" } })).status).toBe(200)
  })
})

describe("engine API", () => {
  it("reports state before any round", async () => {
    const res = await createApp(await makeOptions()).request("/api/state")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      price: null,
      chain: { root: null, sequence: 0 },
      latest_outputs: [],
      pipeline_stage: "idle",
    })
  })

  it("returns recent rounds from history", async () => {
    const options = await makeOptions()
    options.state.recordTrade(1000, 100)
    await options.runner.runOnce()
    await options.runner.runOnce()
    const app = createApp(options)

    const body = await (await app.request("/api/history?limit=1")).json()
    expect(body).toMatchObject({ rounds: [expect.objectContaining({ results: expect.any(Array) })] })
    expect((await app.request("/api/history?limit=0")).status).toBe(400)
  })

  it("verifies the chain", async () => {
    const options = await makeOptions()
    options.state.recordTrade(1000, 100)
    await options.runner.runOnce()

    const body = await (await createApp(options).request("/api/chain/verify")).json()

    expect(body).toEqual({
      valid: true,
      entries: 1,
      checkedFiles: 1,
      errors: [],
      root: options.ledger.getCurrentRoot(),
    })
  })
})

describe("POST /api/signals", () => {
  it("records signal proxies used by the next round", async () => {
    const options = await makeOptions()
    options.state.recordTrade(1000, 100)

    const res = await createApp(options).request("/api/signals", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ tips: 12.5, whales: 3 }),
    })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ accepted: true, ts: 1_700_000_000_000 })
    const context = options.state.toContext(1_700_000_000_000)
    expect(context?.sol_tips_proxy).toBe(12.5)
    expect(context?.sol_whales_proxy).toBe(3)
  })

  it("rejects an invalid update", async () => {
    const app = createApp(await makeOptions())

    const res = await app.request("/api/signals", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ tips: -1, whales: 3 }),
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: "Invalid signal update" })
  })

  it("rejects a body that is not JSON", async () => {
    const app = createApp(await makeOptions())

    const res = await app.request("/api/signals", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{tips",
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "Invalid JSON body" })
  })
})
