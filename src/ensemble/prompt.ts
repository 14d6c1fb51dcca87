// src/ensemble/prompt.ts — Fixed prompt template and round id derivation

import { createHash } from "node:crypto"
import type { RoundContext } from "./types.js"

/** Render the championship prompt for one round context. */
export function buildPrompt(context: RoundContext): string {
  return (
    "You are competing in a public Novelty Championship.\n" +
    "Respond with exactly ONE item starting with:\n" +
    "TRADE: <pair, direction, entry, exit, expected X% profit, 3-line python stub>\n" +
    "or\n" +
    "PAPER: <Title> — 300 words abstract with a concrete mechanism and evaluation path.\n\n" +
    "Context JSON: {\n" +
    `    "symbol": "${context.symbol}",\n` +
    `    "price": ${context.price},\n` +
    `    "sol_tips_proxy": ${context.sol_tips_proxy},\n` +
    `    "sol_whales_proxy": ${context.sol_whales_proxy},\n` +
    `    "trending_source": "${context.trending_source}",\n` +
    `    "timestamp": ${context.timestamp}\n}\n\n` +
    "Rules: no filler, no preamble, one output only."
  )
}

/**
 * `round_<unix seconds>_<NNNN>`, NNNN taken from a SHA-256 of the prompt.
 * Collisions are tolerated; the id only needs to be stable for one prompt at one second.
 */
export function deriveRoundId(prompt: string, nowMs: number): string {
  const digest = createHash("sha256").update(prompt, "utf8").digest()
  const bucket = digest.readUInt32BE(0) % 10_000
  return `round_${Math.floor(nowMs / 1000)}_${bucket.toString().padStart(4, "0")}`
}
