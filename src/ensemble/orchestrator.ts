// src/ensemble/orchestrator.ts — Ensemble dispatcher
// Sends one prompt to every endpoint concurrently under a shared round deadline.
// Every failure mode becomes a per-endpoint RoundResult; a round never throws.
// Calls still pending at the deadline are not cancelled, their late results are dropped.

import { buildPrompt, deriveRoundId } from "./prompt.js"
import type {
  EndpointStats,
  EnsembleMember,
  ModelResponse,
  RoundContext,
  RoundRecord,
  RoundResult,
} from "./types.js"

// --- Types ---

export interface OrchestratorConfig {
  /** Overall round deadline (default: 120_000) */
  roundTimeoutMs: number
  /** In-memory round history cap, oldest evicted first (default: 1000) */
  historyLimit: number
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  roundTimeoutMs: 120_000,
  historyLimit: 1000,
}

/** Receives every per-endpoint result as it is classified (metrics hook). */
export interface RoundObserver {
  recordResult(result: RoundResult): void
}

export const noopObserver: RoundObserver = {
  recordResult() {},
}

export interface PerformanceMetrics {
  active_clients: number
  total_rounds: number
  success_rate: number
  avg_latency_ms: number
  total_errors: number
}

type CallOutcome =
  | { status: "fulfilled"; value: ModelResponse }
  | { status: "rejected"; reason: unknown }
  | { status: "timeout" }

const TIMED_OUT: CallOutcome = { status: "timeout" }

// --- Result builders ---

function successResult(name: string, response: ModelResponse): RoundResult {
  return {
    endpoint_name: name,
    text: response.text,
    latency_ms: response.latency_ms,
    error: null,
    success: true,
  }
}

function errorResult(name: string, reason: unknown): RoundResult {
  const error = reason instanceof Error ? reason : new Error(String(reason))
  return {
    endpoint_name: name,
    text: `ERROR: ${error.name}: ${error.message}`,
    latency_ms: 0,
    error: error.message,
    success: false,
  }
}

function timeoutResult(name: string): RoundResult {
  return {
    endpoint_name: name,
    text: "ERROR: Request timeout",
    latency_ms: 0,
    error: "timeout",
    success: false,
  }
}

// --- EnsembleOrchestrator ---

export class EnsembleOrchestrator {
  private readonly clients: readonly EnsembleMember[]
  private readonly config: OrchestratorConfig
  private readonly observer: RoundObserver
  private readonly now: () => number
  private history: RoundRecord[] = []

  constructor(
    clients: readonly EnsembleMember[],
    config?: Partial<OrchestratorConfig>,
    opts?: { observer?: RoundObserver; now?: () => number },
  ) {
    this.clients = clients
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config }
    this.observer = opts?.observer ?? noopObserver
    this.now = opts?.now ?? Date.now
  }

  /** Results of one round, in configured client order. */
  async executeRound(context: RoundContext): Promise<RoundResult[]> {
    const record = await this.dispatch(context)
    return [...record.results]
  }

  /** Run one round and return the full record that was appended to history. */
  async dispatch(context: RoundContext): Promise<RoundRecord> {
    const prompt = buildPrompt(context)
    const startedAt = this.now()
    const roundId = deriveRoundId(prompt, startedAt)

    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<CallOutcome>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.config.roundTimeoutMs)
    })

    let outcomes: CallOutcome[]
    try {
      outcomes = await Promise.all(
        this.clients.map((client) => Promise.race([this.call(client, prompt, roundId), deadline])),
      )
    } finally {
      clearTimeout(timer)
    }

    const results = outcomes.map((outcome, i) => {
      const name = this.clients[i].name
      const result =
        outcome.status === "fulfilled" ? successResult(name, outcome.value)
        : outcome.status === "rejected" ? errorResult(name, outcome.reason)
        : timeoutResult(name)
      this.observer.recordResult(result)
      return result
    })

    const failed = results.filter((r) => !r.success).length
    if (failed > 0) {
      console.warn(`[ensemble] ${roundId}: ${failed}/${results.length} endpoints failed`)
    }

    const record: RoundRecord = {
      round_id: roundId,
      timestamp: new Date(startedAt).toISOString(),
      context,
      results,
    }
    this.history.push(record)
    if (this.history.length > this.config.historyLimit) {
      this.history.splice(0, this.history.length - this.config.historyLimit)
    }
    return record
  }

  getHistory(): RoundRecord[] {
    return [...this.history]
  }

  getClientStats(): Record<string, EndpointStats> {
    const stats: Record<string, EndpointStats> = {}
    for (const client of this.clients) stats[client.name] = client.getStats()
    return stats
  }

  getPerformanceMetrics(): PerformanceMetrics {
    const stats = this.clients.map((c) => c.getStats())
    const successful = stats.reduce((sum, s) => sum + s.successful_calls, 0)
    const total = stats.reduce((sum, s) => sum + s.total_calls, 0)
    const latencies = stats.map((s) => s.avg_latency_ms).filter((v) => v > 0)

    return {
      active_clients: this.clients.filter((c) => c.isHealthy()).length,
      total_rounds: this.history.length,
      success_rate: total > 0 ? successful / total : 1,
      avg_latency_ms: latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0,
      total_errors: stats.reduce((sum, s) => sum + s.error_count, 0),
    }
  }

  /** Never rejects: synchronous throws and rejections both become a "rejected" outcome. */
  private call(client: EnsembleMember, prompt: string, roundId: string): Promise<CallOutcome> {
    return Promise.resolve()
      .then(() => client.generate(prompt, roundId))
      .then(
        (value): CallOutcome => ({ status: "fulfilled", value }),
        (reason: unknown): CallOutcome => ({ status: "rejected", reason }),
      )
  }
}
