// src/ledger/merkle-logger.ts — Hash-chained round log with retention cap
//
// Each round is serialized canonically (sorted keys at every level), hashed with
// SHA-256 and written to `<digest>.json`. The chain root folds every digest in:
//   root_n = sha256(root_{n-1} ‖ digest_n)   (raw 32-byte digests, root_0 = empty)
// A `chain.jsonl` index records {seq, digest, root, ts} per round in write order,
// so consumers can replay the fold even after old entry files have been pruned.

import { createHash } from "node:crypto"
import { appendFile, readFile, rename, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { LedgerWriteError } from "../errors.js"
import type { RoundRecord } from "../ensemble/types.js"
import { ArchiveManager, isMissing } from "./archive-manager.js"

// ── Async mutex: one logRound at a time so roots never interleave ──

class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.chain
    let release = () => {}
    this.chain = new Promise<void>((resolve) => { release = resolve })

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

// ── Types ───────────────────────────────────────────────────

export const ChainIndexEntrySchema = Type.Object({
  seq: Type.Integer({ minimum: 1 }),
  digest: Type.String({ pattern: "^[0-9a-f]{64}$" }),
  root: Type.String({ pattern: "^[0-9a-f]{64}$" }),
  ts: Type.String(),
})

export type ChainIndexEntry = Static<typeof ChainIndexEntrySchema>

export interface ChainVerifyResult {
  valid: boolean
  entries: number
  checkedFiles: number
  errors: string[]
}

export interface MerkleLoggerOptions {
  /** Maximum persisted entry files (default: 12_000) */
  archiveCap?: number
  now?: () => number
}

export const INDEX_FILE = "chain.jsonl"

// ── Canonical serialization + hashing ───────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** JSON.stringify replacer that sorts object keys at every nesting level. */
function sortReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value
  const sorted: Record<string, unknown> = {}
  for (const k of Object.keys(value).sort()) sorted[k] = value[k]
  return sorted
}

/** Stable serialization: identical logical content always yields identical bytes. */
export function canonicalize(value: unknown): string {
  return JSON.stringify(value, sortReplacer)
}

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex")
}

/** Fold one content digest into the running root. */
export function combineHashes(prevRoot: string | null, digest: string): string {
  return createHash("sha256")
    .update(prevRoot ? Buffer.from(prevRoot, "hex") : Buffer.alloc(0))
    .update(Buffer.from(digest, "hex"))
    .digest("hex")
}

/** Re-derive the root from content digests in write order. */
export function replayRoot(digests: Iterable<string>): string | null {
  let root: string | null = null
  for (const digest of digests) root = combineHashes(root, digest)
  return root
}

function parseIndexLine(line: string): ChainIndexEntry | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  return Value.Check(ChainIndexEntrySchema, parsed) ? parsed : null
}

// ── MerkleLogger ────────────────────────────────────────────

export class MerkleLogger {
  readonly archive: ArchiveManager
  private readonly indexPath: string
  private readonly archiveCap: number
  private readonly now: () => number
  private readonly mutex = new AsyncMutex()

  private currentRoot: string | null = null
  private seq = 0
  /** Entry name → seq of its latest write, used to order equal mtimes. */
  private writeOrder = new Map<string, number>()

  constructor(baseDir: string, options?: MerkleLoggerOptions) {
    this.archive = new ArchiveManager(baseDir)
    this.indexPath = join(baseDir, INDEX_FILE)
    this.archiveCap = options?.archiveCap ?? 12_000
    this.now = options?.now ?? Date.now
    if (!Number.isInteger(this.archiveCap) || this.archiveCap < 1) {
      throw new RangeError(`archiveCap must be a positive integer (got ${this.archiveCap})`)
    }
  }

  async init(): Promise<void> {
    await this.archive.init()
  }

  /**
   * Restore seq, root and write order from the index. A final line that does not
   * parse is a torn append: it is dropped and the index rewritten without it.
   */
  async recover(): Promise<void> {
    const lines = await this.readIndexLines()
    const tail = lines.at(-1)
    if (tail !== undefined && parseIndexLine(tail) === null) {
      lines.pop()
      console.warn(`[ledger] dropping torn index line ${lines.length + 1} in ${this.indexPath}`)
      await this.rewriteIndex(lines)
    }

    const entries: ChainIndexEntry[] = []
    for (const [i, line] of lines.entries()) {
      const entry = parseIndexLine(line)
      if (entry === null) throw new Error(`[ledger] malformed index line ${i + 1} in ${this.indexPath}`)
      entries.push(entry)
    }

    const last = entries.at(-1)
    if (!last) return
    this.seq = last.seq
    this.currentRoot = last.root
    this.writeOrder = new Map(entries.map((e): [string, number] => [`${e.digest}.json`, e.seq]))
    console.log(`[ledger] recovered chain: seq=${this.seq}, root=${this.currentRoot.slice(0, 12)}`)
  }

  /**
   * Persist a round and advance the chain. Throws LedgerWriteError when the entry
   * or its index line cannot be written; the root is left unchanged in that case.
   */
  async logRound(record: RoundRecord): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const blob = Buffer.from(canonicalize(record), "utf8")
      const digest = sha256Hex(blob)
      const root = combineHashes(this.currentRoot, digest)
      const seq = this.seq + 1
      const name = `${digest}.json`

      await this.writeEntry(name, blob)

      const indexLine: ChainIndexEntry = { seq, digest, root, ts: new Date(this.now()).toISOString() }
      try {
        await appendFile(this.indexPath, JSON.stringify(indexLine) + "\n", "utf-8")
      } catch (err) {
        throw new LedgerWriteError(this.indexPath, err)
      }

      this.seq = seq
      this.currentRoot = root
      this.writeOrder.set(name, seq)

      await this.prune()
      return root
    })
  }

  getCurrentRoot(): string | null {
    return this.currentRoot
  }

  getSequence(): number {
    return this.seq
  }

  /**
   * Recompute every root from the index and re-hash every entry file that is
   * still on disk. Pruned entries are skipped, not reported.
   */
  async verifyChain(): Promise<ChainVerifyResult> {
    const errors: string[] = []
    const lines = await this.readIndexLines()
    let prevRoot: string | null = null
    let checkedFiles = 0
    let count = 0

    for (let i = 0; i < lines.length; i++) {
      let parsed: unknown
      try {
        parsed = JSON.parse(lines[i])
      } catch {
        errors.push(`Line ${i + 1}: invalid JSON`)
        continue
      }
      if (!Value.Check(ChainIndexEntrySchema, parsed)) {
        errors.push(`Line ${i + 1}: malformed index entry`)
        continue
      }
      count++

      if (parsed.seq !== count) {
        errors.push(`Line ${i + 1}: seq ${parsed.seq} out of order (expected ${count})`)
      }

      const expectedRoot = combineHashes(prevRoot, parsed.digest)
      if (parsed.root !== expectedRoot) {
        errors.push(`Line ${i + 1} (seq ${parsed.seq}): root mismatch`)
      }
      prevRoot = parsed.root

      const content = await this.readEntry(`${parsed.digest}.json`)
      if (content !== null) {
        checkedFiles++
        if (sha256Hex(content) !== parsed.digest) {
          errors.push(`Line ${i + 1} (seq ${parsed.seq}): entry ${parsed.digest} content hash mismatch`)
        }
      }
    }

    if (this.currentRoot !== null && prevRoot !== this.currentRoot) {
      errors.push("index tail does not match the in-memory root")
    }

    return { valid: errors.length === 0, entries: count, checkedFiles, errors }
  }

  // ── Private ─────────────────────────────────────────────

  private async writeEntry(name: string, blob: Buffer): Promise<void> {
    const path = join(this.archive.root, name)
    const tmpPath = `${path}.tmp`
    try {
      await writeFile(tmpPath, blob)
      await rename(tmpPath, path)
    } catch (err) {
      throw new LedgerWriteError(path, err)
    }
  }

  private async readEntry(name: string): Promise<Buffer | null> {
    try {
      return await readFile(join(this.archive.root, name))
    } catch (err) {
      if (isMissing(err)) return null
      throw err
    }
  }

  private async readIndexLines(): Promise<string[]> {
    let content: string
    try {
      content = await readFile(this.indexPath, "utf-8")
    } catch (err) {
      if (isMissing(err)) return []
      throw err
    }
    return content.split("\n").filter((l) => l.length > 0)
  }

  private async rewriteIndex(lines: string[]): Promise<void> {
    const tmpPath = `${this.indexPath}.tmp`
    try {
      await writeFile(tmpPath, lines.map((l) => l + "\n").join(""), "utf-8")
      await rename(tmpPath, this.indexPath)
    } catch (err) {
      throw new LedgerWriteError(this.indexPath, err)
    }
  }

  private async prune(): Promise<void> {
    try {
      const removed = await this.archive.pruneTo(this.archiveCap, this.writeOrder)
      for (const name of removed) this.writeOrder.delete(name)
    } catch (err) {
      // The round is already persisted and chained; retention retries on the next write
      console.warn("[ledger] prune failed:", err instanceof Error ? err.message : String(err))
    }
  }
}
