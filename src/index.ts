// src/index.ts — champ-engine entry point
// Boot sequence: config → metrics/alerts → ledger recovery → ensemble → feed → gateway → scheduler → serve

import { join } from "node:path"
import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { CircuitBreaker } from "./resilience/circuit-breaker.js"
import { StreamManager } from "./streams/stream-manager.js"
import { createWsOpener } from "./streams/ws-source.js"
import { TradeFeed } from "./streams/trade-feed.js"
import { createModelClients } from "./ensemble/model-client.js"
import { EnsembleOrchestrator } from "./ensemble/orchestrator.js"
import { MerkleLogger } from "./ledger/merkle-logger.js"
import { MarketState } from "./engine/market-state.js"
import { RoundRunner } from "./engine/round-runner.js"
import { RoundScheduler } from "./scheduler/round-scheduler.js"
import { HealthMonitor } from "./monitoring/health.js"
import { AlertService } from "./monitoring/alert-service.js"
import { createEngineMetrics, MetricsRoundObserver } from "./monitoring/metrics.js"
import { createApp } from "./gateway/server.js"

async function main() {
  const bootStart = Date.now()
  console.log("[champ] booting champ-engine...")

  // 1. Load config
  const config = loadConfig()
  console.log(
    `[champ] config loaded: symbol=${config.symbol}, endpoints=${config.endpoints.map((e) => e.name).join(",")}, port=${config.port}`,
  )

  // 2. Metrics and alerts
  const metrics = createEngineMetrics()
  const alerts = new AlertService({
    channels: { webhook: config.alertWebhook ? { url: config.alertWebhook } : undefined },
  })
  console.log(`[champ] alerts: webhook ${config.alertWebhook ? "enabled" : "disabled (set ALERT_WEBHOOK)"}`)

  // 3. Ledger: restore chain position, then check it
  const ledger = new MerkleLogger(join(config.dataRoot, "rounds"), { archiveCap: config.archiveCap })
  await ledger.init()
  await ledger.recover()
  const verification = await ledger.verifyChain()
  if (!verification.valid) {
    console.warn(`[ledger] chain verification found ${verification.errors.length} problem(s): ${verification.errors.slice(0, 3).join("; ")}`)
    await alerts.fire("error", "chain_verification_failed", {
      key: "ledger",
      message: `${verification.errors.length} chain verification error(s) at boot`,
      details: { errors: verification.errors.slice(0, 20) },
    })
  }
  console.log(`[ledger] ready: seq=${ledger.getSequence()}, entries=${verification.entries}, files checked=${verification.checkedFiles}`)

  // 4. Ensemble
  const clients = createModelClients(config)
  const orchestrator = new EnsembleOrchestrator(
    clients,
    { roundTimeoutMs: config.roundTimeoutMs },
    { observer: new MetricsRoundObserver(metrics) },
  )
  metrics.setGauge("champ_active_clients", {}, clients.length)

  // 5. Market feed behind a circuit breaker
  const state = new MarketState(config.symbol, config.histPoints, config.trendingSource)
  const breaker = new CircuitBreaker(config.circuitBreaker)
  breaker.on("circuit:opened", () => {
    console.warn("[stream] circuit opened")
    void alerts.fire("warning", "stream_circuit_opened", {
      key: config.streamUrl,
      message: `stream circuit opened after ${config.circuitBreaker.maxFailures} failures`,
    })
  })
  breaker.on("circuit:half-open", () => console.log("[stream] circuit half-open, probing"))
  breaker.on("circuit:closed", () => console.log("[stream] circuit closed"))
  const manager = new StreamManager(createWsOpener(), breaker)
  const feed = new TradeFeed(manager, state, config.streamUrl)

  // 6. Round runner
  const runner = new RoundRunner({ state, orchestrator, ledger, metrics, alerts, stream: manager })

  // 7. Health checks
  const scheduler = new RoundScheduler()
  const health = new HealthMonitor()
  health.registerHealthCheck("stream", () => {
    const snapshot = manager.getHealthMetrics()
    const status = snapshot.circuit_breaker_state === "OPEN" ? "down"
      : snapshot.circuit_breaker_state === "HALF_OPEN" || snapshot.current_downtime > 0 ? "degraded"
      : "ok"
    return { status, ...snapshot }
  })
  health.registerHealthCheck("ensemble", () => {
    const perf = orchestrator.getPerformanceMetrics()
    const status = perf.active_clients === 0 ? "down" : perf.active_clients < clients.length ? "degraded" : "ok"
    return { status, ...perf }
  })
  health.registerHealthCheck("ledger", () => ({
    status: "ok",
    root: ledger.getCurrentRoot(),
    sequence: ledger.getSequence(),
  }))
  health.registerHealthCheck("scheduler", () => {
    const tasks = scheduler.getStatus()
    return { status: tasks.some((t) => t.state === "error") ? "degraded" : "ok", tasks }
  })

  // 8. Gateway
  const app = createApp({
    health,
    metrics,
    runner,
    state,
    ledger,
    stream: manager,
    metricsBearerToken: config.metricsBearerToken,
  })

  // 9. Start feed (runs until stopped)
  const feedDone = feed.start().catch((err: unknown) => {
    console.error("[stream] feed loop exited with error:", err)
  })

  // 10. Scheduler
  scheduler.register({
    id: "round",
    name: "Championship round",
    intervalMs: config.roundIntervalMs,
    handler: () => runner.runOnce(),
  })
  if (config.backupDir) {
    const backupDir = config.backupDir
    scheduler.register({
      id: "backup",
      name: "Archive backup",
      intervalMs: config.backupIntervalMs,
      handler: async () => {
        const copied = await ledger.archive.backup(backupDir)
        console.log(`[ledger] backup: ${copied} entries copied to ${backupDir}`)
      },
    })
  }
  scheduler.start()
  console.log(`[scheduler] started: ${scheduler.getStatus().map((t) => t.id).join(", ")}`)

  // 11. Serve
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[champ] serving on ${config.host}:${info.port} (boot ${Date.now() - bootStart}ms)`)
  })

  // 12. Graceful shutdown: stop triggers, close inbound, wait for the feed loop
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[champ] ${signal} received, shutting down gracefully...`)

    scheduler.stop()
    feed.stop()
    server.close()
    await feedDone

    console.log(`[champ] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error("[champ] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    void gracefulShutdown(signal)
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[champ] fatal:", err)
  process.exit(1)
})
