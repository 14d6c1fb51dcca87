// src/monitoring/alert-service.ts — Out-of-band alerts for engine failures
//
// Routes alerts to configured channels (webhook, console log) by severity.
// Deduplication prevents alert storms using a time-windowed cache keyed on
// {severity}:{triggerType}:{key}.

// ── Types ───────────────────────────────────────────────────

export type AlertSeverity = "critical" | "error" | "warning" | "info"

export type AlertChannel = "webhook" | "log"

export interface AlertContext {
  /** Dedup discriminator, e.g. a round id or endpoint name */
  key?: string
  message: string
  details?: Record<string, unknown>
}

export interface AlertServiceConfig {
  channels: {
    webhook?: { url: string }
  }
  routing?: Record<AlertSeverity, AlertChannel[]>
  deduplicationWindowMs?: number
}

export const DEFAULT_ROUTING: Record<AlertSeverity, AlertChannel[]> = {
  critical: ["webhook", "log"],
  error: ["webhook", "log"],
  warning: ["webhook", "log"],
  info: ["log"],
}

const DEFAULT_DEDUP_WINDOW_MS = 15 * 60 * 1000

// ── AlertService ────────────────────────────────────────────

/** fire() never throws: channel errors are logged to stderr. */
export class AlertService {
  private readonly config: AlertServiceConfig
  private readonly routing: Record<AlertSeverity, AlertChannel[]>
  private readonly dedupCache = new Map<string, number>()
  private readonly dedupWindowMs: number
  private readonly fetchFn: typeof globalThis.fetch
  private readonly now: () => number

  constructor(
    config: AlertServiceConfig,
    deps?: { fetch?: typeof globalThis.fetch; now?: () => number },
  ) {
    this.config = config
    this.routing = config.routing ?? DEFAULT_ROUTING
    this.dedupWindowMs = config.deduplicationWindowMs ?? DEFAULT_DEDUP_WINDOW_MS
    this.fetchFn = deps?.fetch ?? globalThis.fetch
    this.now = deps?.now ?? Date.now
  }

  /** Returns true if the alert was dispatched, false if it was deduplicated. */
  async fire(severity: AlertSeverity, triggerType: string, context: AlertContext): Promise<boolean> {
    try {
      this.cleanupDedupCache()

      const dedupKey = `${severity}:${triggerType}:${context.key ?? "_"}`
      const lastFired = this.dedupCache.get(dedupKey)
      const currentTime = this.now()
      if (lastFired !== undefined && currentTime - lastFired < this.dedupWindowMs) {
        return false
      }
      this.dedupCache.set(dedupKey, currentTime)

      const channels = this.routing[severity]
      await Promise.allSettled(
        channels.map((channel) => this.dispatch(channel, severity, triggerType, context)),
      )
      return true
    } catch (err) {
      console.error("[alert] unexpected error in fire():", err)
      return false
    }
  }

  // ── Private helpers ─────────────────────────────────────

  private async dispatch(
    channel: AlertChannel,
    severity: AlertSeverity,
    triggerType: string,
    context: AlertContext,
  ): Promise<void> {
    try {
      switch (channel) {
        case "log":
          this.sendLog(severity, triggerType, context)
          break
        case "webhook":
          await this.sendWebhook(severity, triggerType, context)
          break
      }
    } catch (err) {
      console.error(`[alert] channel "${channel}" failed:`, err instanceof Error ? err.message : err)
    }
  }

  private sendLog(severity: AlertSeverity, triggerType: string, context: AlertContext): void {
    const prefix = `[alert:${severity}] ${triggerType}`
    const payload = { ...context, timestamp: new Date(this.now()).toISOString() }

    switch (severity) {
      case "critical":
      case "error":
        console.error(prefix, payload)
        break
      case "warning":
        console.warn(prefix, payload)
        break
      case "info":
        console.info(prefix, payload)
        break
    }
  }

  /** Slack/PagerDuty-compatible JSON body. */
  private async sendWebhook(severity: AlertSeverity, triggerType: string, context: AlertContext): Promise<void> {
    const webhook = this.config.channels.webhook
    if (!webhook) return

    const response = await this.fetchFn(webhook.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        severity,
        triggerType,
        timestamp: new Date(this.now()).toISOString(),
        context: {
          key: context.key ?? null,
          message: context.message,
          details: context.details ?? null,
        },
      }),
    })

    if (!response.ok) {
      const text = await response.text()
      throw new Error(`Webhook ${response.status}: ${text}`)
    }
  }

  private cleanupDedupCache(): void {
    const cutoff = this.now() - this.dedupWindowMs
    for (const [key, ts] of this.dedupCache) {
      if (ts < cutoff) this.dedupCache.delete(key)
    }
  }
}
