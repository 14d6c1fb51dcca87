// src/engine/round-runner.ts — One championship round: context → dispatch → chained log
//
// Tracks the active pipeline stage, keeps the latest top outputs for the state
// API, and raises alerts when every endpoint fails or the ledger rejects a write.

import type { EnsembleOrchestrator, PerformanceMetrics } from "../ensemble/orchestrator.js"
import type { RoundRecord, RoundResult } from "../ensemble/types.js"
import type { MerkleLogger } from "../ledger/merkle-logger.js"
import type { AlertService } from "../monitoring/alert-service.js"
import type { MetricRegistry } from "../monitoring/metrics.js"
import type { StreamHealthSnapshot } from "../streams/stream-manager.js"
import type { MarketState, PricePoint } from "./market-state.js"

export type PipelineStage = "idle" | "context" | "dispatch" | "logging"

const STAGES: readonly PipelineStage[] = ["idle", "context", "dispatch", "logging"]

export const MAX_LATEST_OUTPUTS = 10

export interface TopOutput {
  round_id: string
  endpoint_name: string
  text: string
  latency_ms: number
  timestamp: string
}

export type RoundOutcome =
  | { status: "skipped"; reason: string }
  | { status: "completed"; record: RoundRecord; root: string }

export interface EngineSnapshot {
  pipeline_stage: PipelineStage
  latest_outputs: TopOutput[]
  price: number | null
  price_history: PricePoint[]
  chain: { root: string | null; sequence: number }
  performance: PerformanceMetrics
  stream: StreamHealthSnapshot | null
}

export interface RoundRunnerDeps {
  state: MarketState
  orchestrator: EnsembleOrchestrator
  ledger: MerkleLogger
  metrics: MetricRegistry
  alerts?: AlertService
  stream?: { getHealthMetrics(): StreamHealthSnapshot }
  now?: () => number
}

export class RoundRunner {
  private stage: PipelineStage = "idle"
  private latestOutputs: TopOutput[] = []
  private readonly now: () => number

  constructor(private readonly deps: RoundRunnerDeps) {
    this.now = deps.now ?? Date.now
    this.setStage("idle")
  }

  /**
   * Run one round. Skips when no price has been observed yet. A ledger failure
   * is alerted and rethrown; the chain root stays where it was.
   */
  async runOnce(): Promise<RoundOutcome> {
    const { state, orchestrator, ledger, metrics } = this.deps

    this.setStage("context")
    const context = state.toContext(this.now())
    if (!context) {
      this.setStage("idle")
      metrics.incrementCounter("champ_rounds_total", { outcome: "skipped" })
      console.log("[champ] no price observed yet, skipping round")
      return { status: "skipped", reason: "no_price" }
    }

    try {
      this.setStage("dispatch")
      const record = await orchestrator.dispatch(context)
      metrics.setGauge("champ_active_clients", {}, orchestrator.getPerformanceMetrics().active_clients)

      const ok = record.results.filter((r) => r.success).length
      console.log(`[champ] ${record.round_id}: ${ok}/${record.results.length} endpoints succeeded`)
      if (record.results.length > 0 && ok === 0) {
        await this.deps.alerts?.fire("error", "all_endpoints_failed", {
          key: "ensemble",
          message: `every endpoint failed in ${record.round_id}`,
          details: { errors: record.results.map((r) => ({ endpoint: r.endpoint_name, error: r.error })) },
        })
      }
      this.keepTopOutput(record)

      this.setStage("logging")
      let root: string
      try {
        root = await ledger.logRound(record)
      } catch (err) {
        metrics.incrementCounter("champ_rounds_total", { outcome: "failed" })
        await this.deps.alerts?.fire("critical", "ledger_write_failed", {
          key: "ledger",
          message: err instanceof Error ? err.message : String(err),
          details: { round_id: record.round_id },
        })
        throw err
      }

      metrics.incrementCounter("champ_rounds_total", { outcome: "completed" })
      console.log(`[ledger] ${record.round_id} chained, root=${root.slice(0, 12)}`)
      return { status: "completed", record, root }
    } finally {
      this.setStage("idle")
    }
  }

  getStage(): PipelineStage {
    return this.stage
  }

  getLatestOutputs(): TopOutput[] {
    return this.latestOutputs.map((o) => ({ ...o }))
  }

  /** Dispatched rounds still held in memory, oldest first. */
  getHistory(): RoundRecord[] {
    return this.deps.orchestrator.getHistory()
  }

  snapshot(): EngineSnapshot {
    const { state, orchestrator, ledger, stream } = this.deps
    return {
      pipeline_stage: this.stage,
      latest_outputs: this.getLatestOutputs(),
      price: state.latestPrice(),
      price_history: state.getPriceHistory(),
      chain: { root: ledger.getCurrentRoot(), sequence: ledger.getSequence() },
      performance: orchestrator.getPerformanceMetrics(),
      stream: stream?.getHealthMetrics() ?? null,
    }
  }

  /** Newest first; one entry per round, the longest successful text. */
  private keepTopOutput(record: RoundRecord): void {
    let best: RoundResult | null = null
    for (const result of record.results) {
      if (result.success && (!best || result.text.length > best.text.length)) best = result
    }
    if (!best) return

    this.latestOutputs.unshift({
      round_id: record.round_id,
      endpoint_name: best.endpoint_name,
      text: best.text,
      latency_ms: best.latency_ms,
      timestamp: record.timestamp,
    })
    if (this.latestOutputs.length > MAX_LATEST_OUTPUTS) this.latestOutputs.length = MAX_LATEST_OUTPUTS
  }

  private setStage(stage: PipelineStage): void {
    this.stage = stage
    for (const s of STAGES) {
      this.deps.metrics.setGauge("champ_pipeline_status", { stage: s }, s === stage ? 1 : 0)
    }
  }
}
