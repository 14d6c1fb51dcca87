// src/ledger/archive-manager.ts — Directory of persisted round entries: list, prune, back up

import { copyFile, mkdir, readdir, stat, unlink } from "node:fs/promises"
import { join } from "node:path"

export interface ArchiveEntry {
  name: string
  path: string
  mtimeMs: number
  size: number
}

const ENTRY_SUFFIX = ".json"

export function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class ArchiveManager {
  constructor(readonly root: string) {}

  async init(): Promise<void> {
    await mkdir(this.root, { recursive: true })
  }

  /** All `*.json` entries, sorted by file name. */
  async listArchives(): Promise<ArchiveEntry[]> {
    const names = (await readdir(this.root)).filter((n) => n.endsWith(ENTRY_SUFFIX)).sort()
    const entries: ArchiveEntry[] = []
    for (const name of names) {
      const path = join(this.root, name)
      try {
        const info = await stat(path)
        entries.push({ name, path, mtimeMs: info.mtimeMs, size: info.size })
      } catch (err) {
        // Pruned between readdir and stat
        if (!isMissing(err)) throw err
      }
    }
    return entries
  }

  /**
   * Entries oldest first by modification time. Equal mtimes fall back to
   * `writeOrder` (higher = newer); entries it does not know sort first.
   */
  async listByAge(writeOrder?: ReadonlyMap<string, number>): Promise<ArchiveEntry[]> {
    const entries = await this.listArchives()
    const seqOf = (e: ArchiveEntry) => writeOrder?.get(e.name) ?? -1
    return entries.sort((a, b) => a.mtimeMs - b.mtimeMs || seqOf(a) - seqOf(b))
  }

  /** Delete the oldest entries until at most `cap` remain. Returns the deleted names. */
  async pruneTo(cap: number, writeOrder?: ReadonlyMap<string, number>): Promise<string[]> {
    const entries = await this.listByAge(writeOrder)
    const excess = entries.length - cap
    if (excess <= 0) return []

    const removed: string[] = []
    for (const entry of entries.slice(0, excess)) {
      try {
        await unlink(entry.path)
      } catch (err) {
        if (!isMissing(err)) throw err
      }
      removed.push(entry.name)
    }
    return removed
  }

  /** Copy every entry into `destination`. Returns the number of files copied. */
  async backup(destination: string): Promise<number> {
    await mkdir(destination, { recursive: true })
    let copied = 0
    for (const entry of await this.listArchives()) {
      try {
        await copyFile(entry.path, join(destination, entry.name))
        copied++
      } catch (err) {
        if (!isMissing(err)) throw err
      }
    }
    return copied
  }
}
