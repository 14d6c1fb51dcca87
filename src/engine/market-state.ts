// src/engine/market-state.ts — Shared market state written by the feed, read at round start

import type { RoundContext } from "../ensemble/types.js"

export interface PricePoint {
  ts: number
  price: number
}

export interface SignalPoint {
  ts: number
  tips: number
  whales: number
}

/**
 * Bounded price and signal history. The feed handler and the signal route are
 * the only writers; rounds take a value snapshot through `toContext()`.
 */
export class MarketState {
  private prices: PricePoint[] = []
  private signals: SignalPoint[] = []

  constructor(
    readonly symbol: string,
    private readonly histPoints: number,
    private readonly trendingSource: string,
  ) {}

  recordTrade(ts: number, price: number): void {
    this.prices.push({ ts, price })
    if (this.prices.length > this.histPoints) this.prices.shift()
  }

  recordSignals(ts: number, tips: number, whales: number): void {
    this.signals.push({ ts, tips, whales })
    if (this.signals.length > this.histPoints) this.signals.shift()
  }

  hasPrice(): boolean {
    return this.prices.length > 0
  }

  latestPrice(): number | null {
    return this.prices.at(-1)?.price ?? null
  }

  getPriceHistory(): PricePoint[] {
    return this.prices.map((p) => ({ ...p }))
  }

  /** Build the round input from the newest observations. Returns null before the first trade. */
  toContext(nowMs: number): RoundContext | null {
    const price = this.prices.at(-1)
    if (!price) return null
    const signal = this.signals.at(-1)
    const seconds = nowMs / 1000

    return {
      symbol: this.symbol.toUpperCase(),
      price: price.price,
      sol_tips_proxy: signal?.tips ?? 0,
      sol_whales_proxy: signal?.whales ?? 0,
      trending_source: this.trendingSource,
      timestamp: seconds,
      round_id: `round_${Math.floor(seconds)}`,
    }
  }
}
