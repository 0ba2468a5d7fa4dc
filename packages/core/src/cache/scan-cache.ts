import fs from 'node:fs'
import path from 'node:path'
import type { CacheState, DependencyReport, MtimeMap, ScanCacheEntry } from '../types.js'

export const DEFAULT_TTL_MS = 60_000

/**
 * Last report for one repository root, plus the manifest mtimes seen when it
 * was built. The TTL is a ceiling: a fresh entry is served as is until it
 * expires, a watched file changes, or `invalidate()` is called.
 */
export class ScanCache {
  private entry: ScanCacheEntry | null = null

  constructor(readonly ttlMs: number = DEFAULT_TTL_MS) {}

  get current(): ScanCacheEntry | null {
    return this.entry
  }

  state(mtimes: Readonly<MtimeMap>, now: number): CacheState {
    const entry = this.entry
    if (!entry) return 'stale'
    if (now - entry.scannedAt >= this.ttlMs) return 'stale'
    return sameMtimes(entry.mtimes, mtimes) ? 'fresh' : 'stale'
  }

  lookup(mtimes: Readonly<MtimeMap>, now: number): DependencyReport | undefined {
    return this.state(mtimes, now) === 'fresh' ? this.entry?.report : undefined
  }

  // Replaces the whole entry; readers never see a partial update.
  store(report: DependencyReport, mtimes: Readonly<MtimeMap>, now: number): ScanCacheEntry {
    this.entry = Object.freeze({ report, scannedAt: now, mtimes: Object.freeze({ ...mtimes }) })
    return this.entry
  }

  invalidate(): void {
    this.entry = null
  }
}

export function sameMtimes(a: Readonly<MtimeMap>, b: Readonly<MtimeMap>): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)])
  for (const key of keys) {
    // NaN (stat failure) never compares equal, so it always forces a rescan
    if (a[key] !== b[key]) return false
  }
  return true
}

export function readMtimes(root: string, files: readonly string[]): MtimeMap {
  const out: MtimeMap = {}
  for (const file of files) {
    try {
      out[file] = fs.statSync(path.join(root, file), { throwIfNoEntry: false })?.mtimeMs ?? null
    } catch {
      out[file] = Number.NaN
    }
  }
  return out
}
