// src/ensemble/types.ts — Round data model shared by dispatcher, ledger and runner

/** Immutable input to one dispatch round. `timestamp` is Unix seconds. */
export interface RoundContext {
  readonly symbol: string
  readonly price: number
  readonly sol_tips_proxy: number
  readonly sol_whales_proxy: number
  readonly trending_source: string
  readonly timestamp: number
  readonly round_id: string
}

/** Outcome of one endpoint in one round. */
export interface RoundResult {
  readonly endpoint_name: string
  readonly text: string
  readonly latency_ms: number
  readonly error: string | null
  readonly success: boolean
}

/** Unit persisted by the chained log. */
export interface RoundRecord {
  readonly round_id: string
  readonly timestamp: string
  readonly context: RoundContext
  readonly results: readonly RoundResult[]
}

/** Successful response from a single endpoint. */
export interface ModelResponse {
  text: string
  latency_ms: number
}

/** Copy of an endpoint client's rolling counters. */
export interface EndpointStats {
  total_calls: number
  successful_calls: number
  error_count: number
  avg_latency_ms: number
}

/** What the dispatcher needs from each endpoint client. */
export interface EnsembleMember {
  readonly name: string
  generate(prompt: string, roundId: string): Promise<ModelResponse>
  getStats(): EndpointStats
  isHealthy(): boolean
}
