// src/monitoring/metrics.ts — Prometheus text-format registry and engine series
//
// Counters, gauges and histograms serialized in exposition format 0.0.4.
// One registry per process, created by createEngineMetrics() and passed explicitly.

import type { RoundObserver } from "../ensemble/orchestrator.js"
import type { RoundResult } from "../ensemble/types.js"
import type { StreamHealthSnapshot } from "../streams/stream-manager.js"
import type { CircuitState } from "../resilience/circuit-breaker.js"

/** Request latency buckets in seconds */
const DEFAULT_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120]

interface LabeledMetric {
  name: string
  help: string
  labels: Map<string, number>
}

interface HistogramMetric {
  name: string
  help: string
  buckets: number[]
  observations: Map<string, HistogramObservation>
}

interface HistogramObservation {
  bucketCounts: number[]
  sum: number
  count: number
}

// ---------------------------------------------------------------------------
// MetricRegistry
// ---------------------------------------------------------------------------

export class MetricRegistry {
  private readonly counters = new Map<string, LabeledMetric>()
  private readonly gauges = new Map<string, LabeledMetric>()
  private readonly histograms = new Map<string, HistogramMetric>()

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) this.counters.set(name, { name, help, labels: new Map() })
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) this.gauges.set(name, { name, help, labels: new Map() })
  }

  registerHistogram(name: string, help: string, buckets?: number[]): void {
    if (!this.histograms.has(name)) {
      const sorted = [...(buckets ?? DEFAULT_BUCKETS)].sort((a, b) => a - b)
      this.histograms.set(name, { name, help, buckets: sorted, observations: new Map() })
    }
  }

  incrementCounter(name: string, labels: Record<string, string> = {}, value = 1): void {
    const counter = this.counters.get(name)
    if (!counter) return
    const key = this.serializeLabels(labels)
    counter.labels.set(key, (counter.labels.get(key) ?? 0) + value)
  }

  setGauge(name: string, labels: Record<string, string>, value: number): void {
    const gauge = this.gauges.get(name)
    if (!gauge) return
    gauge.labels.set(this.serializeLabels(labels), value)
  }

  getGauge(name: string, labels: Record<string, string> = {}): number | undefined {
    return this.gauges.get(name)?.labels.get(this.serializeLabels(labels))
  }

  getCounter(name: string, labels: Record<string, string> = {}): number | undefined {
    return this.counters.get(name)?.labels.get(this.serializeLabels(labels))
  }

  observeHistogram(name: string, labels: Record<string, string>, value: number): void {
    const histogram = this.histograms.get(name)
    if (!histogram) return
    const key = this.serializeLabels(labels)

    let obs = histogram.observations.get(key)
    if (!obs) {
      obs = { bucketCounts: new Array<number>(histogram.buckets.length).fill(0), sum: 0, count: 0 }
      histogram.observations.set(key, obs)
    }

    obs.sum += value
    obs.count++
    const idx = histogram.buckets.findIndex((b) => value <= b)
    if (idx >= 0) obs.bucketCounts[idx]++ // serialize() accumulates
  }

  serialize(): string {
    const lines: string[] = []

    const emit = (metric: LabeledMetric, type: "counter" | "gauge") => {
      lines.push(`# HELP ${metric.name} ${metric.help}`)
      lines.push(`# TYPE ${metric.name} ${type}`)
      for (const [labels, value] of metric.labels) {
        lines.push(`${metric.name}${labels ? `{${labels}}` : ""} ${value}`)
      }
    }
    for (const counter of this.counters.values()) emit(counter, "counter")
    for (const gauge of this.gauges.values()) emit(gauge, "gauge")

    for (const histogram of this.histograms.values()) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`)
      lines.push(`# TYPE ${histogram.name} histogram`)
      for (const [labels, obs] of histogram.observations) {
        const baseLabels = labels ? `${labels},` : ""
        const suffix = labels ? `{${labels}}` : ""
        let cumulative = 0
        histogram.buckets.forEach((bucket, i) => {
          cumulative += obs.bucketCounts[i]
          lines.push(`${histogram.name}_bucket{${baseLabels}le="${bucket}"} ${cumulative}`)
        })
        lines.push(`${histogram.name}_bucket{${baseLabels}le="+Inf"} ${obs.count}`)
        lines.push(`${histogram.name}_sum${suffix} ${obs.sum}`)
        lines.push(`${histogram.name}_count${suffix} ${obs.count}`)
      }
    }

    return lines.join("\n") + "\n"
  }

  serializeLabels(labels: Record<string, string>): string {
    return Object.entries(labels)
      .map(([k, v]) => `${k}="${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`)
      .join(",")
  }
}

// ---------------------------------------------------------------------------
// Engine series
// ---------------------------------------------------------------------------

const CIRCUIT_STATES: CircuitState[] = ["CLOSED", "OPEN", "HALF_OPEN"]

export function createEngineMetrics(): MetricRegistry {
  const registry = new MetricRegistry()
  registry.registerCounter("champ_model_calls_total", "Endpoint results by model and status")
  registry.registerCounter("champ_rounds_total", "Dispatch rounds by outcome")
  registry.registerHistogram("champ_request_latency_seconds", "Successful endpoint latency in seconds")
  registry.registerGauge("champ_stream_messages_total", "Inbound stream messages received")
  registry.registerGauge("champ_stream_errors_total", "Inbound stream errors")
  registry.registerGauge("champ_stream_reconnects_total", "Inbound stream (re)connections")
  registry.registerGauge("champ_stream_downtime_seconds", "Stream downtime in seconds by kind")
  registry.registerGauge("champ_circuit_state", "Stream circuit breaker state (1=current)")
  registry.registerGauge("champ_pipeline_status", "Round pipeline stage status (1=active)")
  registry.registerGauge("champ_active_clients", "Endpoints currently considered healthy")
  return registry
}

/** RoundObserver that feeds endpoint outcomes into the registry. */
export class MetricsRoundObserver implements RoundObserver {
  constructor(private readonly registry: MetricRegistry) {}

  recordResult(result: RoundResult): void {
    const status = result.success ? "success" : result.error === "timeout" ? "timeout" : "error"
    this.registry.incrementCounter("champ_model_calls_total", { model: result.endpoint_name, status })
    if (result.success) {
      this.registry.observeHistogram("champ_request_latency_seconds", {}, result.latency_ms / 1000)
    }
  }
}

/** Copy a stream health snapshot into the stream gauges (called at scrape time). */
export function recordStreamHealth(registry: MetricRegistry, health: StreamHealthSnapshot): void {
  registry.setGauge("champ_stream_messages_total", {}, health.message_count)
  registry.setGauge("champ_stream_errors_total", {}, health.error_count)
  registry.setGauge("champ_stream_reconnects_total", {}, health.reconnect_count)
  registry.setGauge("champ_stream_downtime_seconds", { kind: "current" }, health.current_downtime)
  registry.setGauge("champ_stream_downtime_seconds", { kind: "total" }, health.total_downtime)
  for (const state of CIRCUIT_STATES) {
    registry.setGauge("champ_circuit_state", { state }, health.circuit_breaker_state === state ? 1 : 0)
  }
}
