// src/streams/trade-feed.ts — Trade event decoding on top of the resilient stream

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { MarketState } from "../engine/market-state.js"
import type { StreamManager } from "./stream-manager.js"

/** Exchange trade event; prices and quantities arrive as decimal strings. */
export const TradeEventSchema = Type.Object({
  e: Type.Literal("trade"),
  s: Type.String(),
  p: Type.String(),
  q: Type.String(),
  T: Type.Number(),
})

export type TradeEvent = Static<typeof TradeEventSchema>

export interface TradeFeedStats {
  trades: number
  ignored: number
}

export class TradeFeed {
  private stats: TradeFeedStats = { trades: 0, ignored: 0 }

  constructor(
    private readonly manager: StreamManager,
    private readonly state: MarketState,
    private readonly url: string,
  ) {}

  /**
   * Decode one raw message. Invalid JSON throws, which the stream manager
   * treats as a handler failure. Well-formed messages that are not trades
   * (subscription acks, other event types) are counted and skipped.
   */
  handleMessage(raw: string): void {
    const payload: unknown = JSON.parse(raw)

    if (!Value.Check(TradeEventSchema, payload)) {
      this.stats.ignored++
      return
    }

    const price = Number.parseFloat(payload.p)
    if (!Number.isFinite(price)) {
      this.stats.ignored++
      return
    }

    this.state.recordTrade(payload.T, price)
    this.stats.trades++
  }

  /** Run until `stop()`. Resolves when the read loop exits. */
  async start(): Promise<void> {
    this.manager.start()
    console.log(`[stream] feed starting: ${this.url}`)
    await this.manager.managedStream(this.url, (message) => this.handleMessage(message))
    console.log("[stream] feed stopped")
  }

  stop(): void {
    this.manager.stop()
  }

  getStats(): TradeFeedStats {
    return { ...this.stats }
  }
}
