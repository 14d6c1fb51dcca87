// tests/streams/stream-manager.test.ts — Reconnect loop, backoff and health counters

import { describe, it, expect, vi, beforeEach } from "vitest"
import { CircuitBreaker } from "../../src/resilience/circuit-breaker.js"
import { StreamManager } from "../../src/streams/stream-manager.js"
import type { StreamOpener, StreamSocket } from "../../src/streams/ws-source.js"

// --- Helpers ---

function fakeSocket(messages: string[], failWith?: Error): StreamSocket {
  return {
    close: vi.fn(),
    async *[Symbol.asyncIterator]() {
      for (const m of messages) yield m
      if (failWith) throw failWith
    },
  }
}

/** Opener that hands out the given sockets in order, rejecting once they run out. */
function scriptedOpener(sockets: StreamSocket[]): StreamOpener {
  let i = 0
  return vi.fn(async () => {
    const socket = sockets[i++]
    if (!socket) throw new Error("no more sockets")
    return socket
  })
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {})
})

describe("StreamManager", () => {
  it("backs off exponentially from 1s and caps at 32s while opens fail", async () => {
    const sleeps: number[] = []
    const opener: StreamOpener = vi.fn(async () => {
      throw new Error("ECONNREFUSED")
    })
    const manager: StreamManager = new StreamManager(opener, new CircuitBreaker({ maxFailures: 100 }), {
      sleep: async (ms) => {
        sleeps.push(ms)
        if (sleeps.length === 7) manager.stop()
      },
    })

    manager.start()
    await manager.managedStream("ws://feed.test", () => {})

    expect(sleeps).toEqual([1000, 2000, 4000, 8000, 16_000, 32_000, 32_000])
    const health = manager.getHealthMetrics()
    expect(health.error_count).toBe(7)
    expect(health.reconnect_count).toBe(0)
    expect(health.last_error).toBe("ECONNREFUSED")
    expect(health.running).toBe(false)
  })

  it("delivers messages in order and counts every successful open", async () => {
    const received: string[] = []
    const manager: StreamManager = new StreamManager(
      scriptedOpener([fakeSocket(["a", "b"]), fakeSocket(["c"])]),
      new CircuitBreaker(),
      { sleep: async () => {} },
    )

    manager.start()
    await manager.managedStream("ws://feed.test", (message) => {
      received.push(message)
      if (message === "c") manager.stop()
    })

    expect(received).toEqual(["a", "b", "c"])
    const health = manager.getHealthMetrics()
    expect(health.message_count).toBe(3)
    expect(health.reconnect_count).toBe(2)
    expect(health.error_count).toBe(0)
  })

  it("treats a handler failure as a connection failure and reconnects without sleeping", async () => {
    const sleep = vi.fn(async () => {})
    const first = fakeSocket(["bad", "never-read"])
    const breaker = new CircuitBreaker({ maxFailures: 5 })
    const received: string[] = []
    const manager: StreamManager = new StreamManager(
      scriptedOpener([first, fakeSocket(["good"])]),
      breaker,
      { sleep },
    )

    manager.start()
    await manager.managedStream("ws://feed.test", (message) => {
      if (message === "bad") throw new Error("undecodable")
      received.push(message)
      manager.stop()
    })

    expect(received).toEqual(["good"])
    expect(first.close).toHaveBeenCalled()
    expect(sleep).not.toHaveBeenCalled()
    const health = manager.getHealthMetrics()
    expect(health.error_count).toBe(1)
    expect(health.last_error).toBe("undecodable")
    expect(health.reconnect_count).toBe(2)
    expect(breaker.getState()).toBe("CLOSED")
  })

  it("counts a read failure and backs off before reconnecting", async () => {
    const sleeps: number[] = []
    const manager: StreamManager = new StreamManager(
      scriptedOpener([fakeSocket(["x"], new Error("connection closed with code 1006")), fakeSocket(["y"])]),
      new CircuitBreaker(),
      { sleep: async (ms) => { sleeps.push(ms) } },
    )

    manager.start()
    await manager.managedStream("ws://feed.test", (message) => {
      if (message === "y") manager.stop()
    })

    expect(sleeps).toEqual([1000])
    expect(manager.getHealthMetrics().error_count).toBe(1)
    expect(manager.getHealthMetrics().message_count).toBe(2)
  })

  it("waits breakerWaitMs without opening while the circuit is OPEN", async () => {
    const sleeps: number[] = []
    const opener: StreamOpener = vi.fn(async () => {
      throw new Error("refused")
    })
    const breaker = new CircuitBreaker({ maxFailures: 1, timeoutMs: 60_000 }, () => 5_000_000)
    const manager: StreamManager = new StreamManager(opener, breaker, {
      breakerWaitMs: 5000,
      sleep: async (ms) => {
        sleeps.push(ms)
        if (sleeps.length === 3) manager.stop()
      },
    })

    manager.start()
    await manager.managedStream("ws://feed.test", () => {})

    expect(sleeps).toEqual([1000, 5000, 5000])
    expect(opener).toHaveBeenCalledTimes(1)
    expect(manager.getHealthMetrics().circuit_breaker_state).toBe("OPEN")
  })

  it("reports current and accumulated downtime past the grace period", async () => {
    let t = 1_000_000
    const manager: StreamManager = new StreamManager(
      scriptedOpener([fakeSocket(["m1", "m2"])]),
      new CircuitBreaker(),
      { now: () => t, downtimeGraceMs: 30_000, sleep: async () => {} },
    )

    manager.start()
    await manager.managedStream("ws://feed.test", (message) => {
      if (message === "m1") {
        t += 45_000
      } else {
        t += 40_000
        manager.stop()
      }
    })

    expect(manager.getHealthMetrics()).toEqual({
      running: false,
      message_count: 2,
      error_count: 0,
      reconnect_count: 1,
      current_downtime: 10,
      total_downtime: 15,
      last_message_time: 1_045_000,
      last_error: null,
      circuit_breaker_state: "CLOSED",
    })
  })

  it("reports no downtime before the first message", () => {
    const manager = new StreamManager(scriptedOpener([]), new CircuitBreaker())
    const health = manager.getHealthMetrics()
    expect(health.current_downtime).toBe(0)
    expect(health.last_message_time).toBeNull()
  })

  it("returns immediately when not started", async () => {
    const opener = scriptedOpener([])
    const manager = new StreamManager(opener, new CircuitBreaker())
    await manager.managedStream("ws://feed.test", () => {})
    expect(opener).not.toHaveBeenCalled()
  })
})
