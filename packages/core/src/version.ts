// Best-effort numeric version handling. No range semantics.

const PREFIX = /^[\sv^~=<>!]+/i

export function stripVersionPrefix(version: string): string {
  return version.replace(PREFIX, '')
}

export function parseMajor(version: string): number | undefined {
  const m = stripVersionPrefix(version).match(/^(\d+)/)
  if (!m) return undefined
  const n = parseInt(m[1] ?? '', 10)
  return Number.isNaN(n) ? undefined : n
}

// Leading x[.y[.z]] of a version or constraint, missing parts read as 0.
export function parseVersionFloor(version: string): [number, number, number] | undefined {
  const m = stripVersionPrefix(version).match(/^(\d+)(?:\.(\d+))?(?:\.(\d+))?/)
  if (!m) return undefined
  return [parseInt(m[1] ?? '0', 10), parseInt(m[2] ?? '0', 10), parseInt(m[3] ?? '0', 10)]
}

export function compareVersions(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0)
    if (d !== 0) return d < 0 ? -1 : 1
  }
  return 0
}
