// src/streams/stream-manager.ts — Resilient long-lived inbound stream with health metrics
//
// Keeps one feed connection alive while running: breaker-gated opens, exponential
// reconnect backoff (1s → 32s), per-message handler dispatch. Connection failures
// never escape the loop; they are counted, reported to the breaker and retried.

import { CircuitBreaker, type CircuitState } from "../resilience/circuit-breaker.js"
import { sleep as defaultSleep, type Sleep } from "../resilience/sleep.js"
import type { StreamOpener, StreamSocket } from "./ws-source.js"

export type MessageHandler = (message: string) => Promise<void> | void

export interface StreamManagerOptions {
  initialBackoffMs?: number   // Default: 1000
  maxBackoffMs?: number       // Default: 32_000
  breakerWaitMs?: number      // Default: 5000
  downtimeGraceMs?: number    // Default: 30_000
  now?: () => number
  sleep?: Sleep
}

/** Read-only copy of the connection counters. Durations are in seconds. */
export interface StreamHealthSnapshot {
  running: boolean
  message_count: number
  error_count: number
  reconnect_count: number
  current_downtime: number
  total_downtime: number
  last_message_time: number | null
  last_error: string | null
  circuit_breaker_state: CircuitState
}

interface ConnectionHealth {
  lastMessageTime: number
  messageCount: number
  errorCount: number
  reconnectCount: number
  totalDowntimeMs: number
  lastError: string | null
}

export class StreamManager {
  readonly circuitBreaker: CircuitBreaker
  private readonly opener: StreamOpener
  private readonly initialBackoffMs: number
  private readonly maxBackoffMs: number
  private readonly breakerWaitMs: number
  private readonly downtimeGraceMs: number
  private readonly now: () => number
  private readonly sleep: Sleep

  private health: ConnectionHealth = {
    lastMessageTime: 0,
    messageCount: 0,
    errorCount: 0,
    reconnectCount: 0,
    totalDowntimeMs: 0,
    lastError: null,
  }
  private running = false
  private socket: StreamSocket | null = null
  private wake = new AbortController()

  constructor(opener: StreamOpener, circuitBreaker?: CircuitBreaker, options?: StreamManagerOptions) {
    this.opener = opener
    this.circuitBreaker = circuitBreaker ?? new CircuitBreaker()
    this.initialBackoffMs = options?.initialBackoffMs ?? 1000
    this.maxBackoffMs = options?.maxBackoffMs ?? 32_000
    this.breakerWaitMs = options?.breakerWaitMs ?? 5000
    this.downtimeGraceMs = options?.downtimeGraceMs ?? 30_000
    this.now = options?.now ?? Date.now
    this.sleep = options?.sleep ?? defaultSleep
  }

  start(): void {
    if (this.running) return
    this.running = true
    this.wake = new AbortController()
  }

  /** Stop the loop. A handler already running completes; pending sleeps end early. */
  stop(): void {
    this.running = false
    this.wake.abort()
    this.socket?.close()
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * Run the read loop until `stop()`. Resolves once the loop has exited;
   * never rejects for connection or handler failures.
   */
  async managedStream(url: string, handler: MessageHandler): Promise<void> {
    let backoffMs = this.initialBackoffMs

    while (this.running) {
      if (!this.circuitBreaker.canExecute()) {
        await this.sleep(this.breakerWaitMs, this.wake.signal)
        continue
      }

      let socket: StreamSocket | null = null
      try {
        socket = await this.opener(url)
        this.socket = socket
        this.health.reconnectCount++
        backoffMs = this.initialBackoffMs
        if (!this.running) break

        for await (const message of socket) {
          if (!this.running) break
          this.recordMessage()

          try {
            await handler(message)
            this.circuitBreaker.onSuccess()
          } catch (err) {
            this.health.errorCount++
            this.health.lastError = describe(err)
            this.circuitBreaker.onFailure()
            console.warn(`[stream] handler failed, reconnecting: ${this.health.lastError}`)
            break
          }
        }
      } catch (err) {
        this.health.errorCount++
        this.health.lastError = describe(err)
        this.circuitBreaker.onFailure()
        console.warn(`[stream] connection error (retry in ${backoffMs}ms): ${this.health.lastError}`)
        await this.sleep(backoffMs, this.wake.signal)
        backoffMs = Math.min(backoffMs * 2, this.maxBackoffMs)
      } finally {
        socket?.close()
        if (this.socket === socket) this.socket = null
      }
    }
  }

  getHealthMetrics(): StreamHealthSnapshot {
    const { lastMessageTime } = this.health
    const currentDowntimeMs = lastMessageTime
      ? Math.max(0, this.now() - lastMessageTime - this.downtimeGraceMs)
      : 0

    return {
      running: this.running,
      message_count: this.health.messageCount,
      error_count: this.health.errorCount,
      reconnect_count: this.health.reconnectCount,
      current_downtime: currentDowntimeMs / 1000,
      total_downtime: this.health.totalDowntimeMs / 1000,
      last_message_time: lastMessageTime || null,
      last_error: this.health.lastError,
      circuit_breaker_state: this.circuitBreaker.getState(),
    }
  }

  private recordMessage(): void {
    const now = this.now()
    if (this.health.lastMessageTime) {
      const gap = now - this.health.lastMessageTime - this.downtimeGraceMs
      if (gap > 0) this.health.totalDowntimeMs += gap
    }
    this.health.lastMessageTime = now
    this.health.messageCount++
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
