// src/resilience/circuit-breaker.ts — Three-state circuit breaker with lazy cooldown

import { EventEmitter } from "node:events"

// ── Types ───────────────────────────────────────────────────

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN"

export interface CircuitBreakerConfig {
  maxFailures?: number  // Default: 5
  timeoutMs?: number    // Default: 60_000
}

export interface CircuitBreakerStats {
  state: CircuitState
  failures: number
  lastFailureAt?: number
  openedAt?: number
}

// ── CircuitBreaker ──────────────────────────────────────────

/**
 * Guards one external resource. The OPEN → HALF_OPEN transition is evaluated
 * on `canExecute()` as a function of the injected clock; no timers are armed.
 *
 * Emits `circuit:opened`, `circuit:half-open` and `circuit:closed` with `{ from }`.
 */
export class CircuitBreaker extends EventEmitter {
  private readonly maxFailures: number
  private readonly timeoutMs: number
  private readonly now: () => number

  private state: CircuitState = "CLOSED"
  private failures = 0
  private lastFailureAt: number | undefined
  private openedAt: number | undefined

  constructor(config?: CircuitBreakerConfig, now?: () => number) {
    super()
    this.maxFailures = config?.maxFailures ?? 5
    this.timeoutMs = config?.timeoutMs ?? 60_000
    if (!Number.isInteger(this.maxFailures) || this.maxFailures < 1) {
      throw new RangeError(`maxFailures must be a positive integer (got ${this.maxFailures})`)
    }
    if (!(this.timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be positive (got ${this.timeoutMs})`)
    }
    this.now = now ?? Date.now
  }

  /** Check if a call may proceed. Moves OPEN → HALF_OPEN once the cooldown has elapsed. */
  canExecute(): boolean {
    if (this.state !== "OPEN") return true
    const elapsed = this.now() - (this.lastFailureAt ?? 0)
    if (elapsed > this.timeoutMs) {
      this.transitionTo("HALF_OPEN")
      return true
    }
    return false
  }

  onSuccess(): void {
    this.failures = 0
    if (this.state !== "CLOSED") this.transitionTo("CLOSED")
  }

  onFailure(): void {
    this.lastFailureAt = this.now()

    if (this.state === "HALF_OPEN") {
      // Probe failed
      this.transitionTo("OPEN")
      return
    }

    this.failures++
    if (this.state === "CLOSED" && this.failures >= this.maxFailures) {
      this.transitionTo("OPEN")
    }
  }

  /** Current state without evaluating the cooldown. */
  getState(): CircuitState {
    return this.state
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      lastFailureAt: this.lastFailureAt,
      openedAt: this.openedAt,
    }
  }

  private transitionTo(to: CircuitState): void {
    const from = this.state
    if (from === to) return
    this.state = to

    if (to === "OPEN") {
      this.openedAt = this.now()
      this.emit("circuit:opened", { from })
    } else if (to === "CLOSED") {
      this.failures = 0
      this.openedAt = undefined
      this.emit("circuit:closed", { from })
    } else {
      this.emit("circuit:half-open", { from })
    }
  }
}
