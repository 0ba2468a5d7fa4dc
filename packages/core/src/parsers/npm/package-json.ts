import type { DeclaredPackage } from '../../types.js'
import { isRecord } from '../../guards.js'
import { stripBom } from '../../normalize.js'

const SECTIONS = ['dependencies', 'devDependencies'] as const

// Throws on malformed JSON; callers decide how to recover.
export function parsePackageJson(jsonText: string, manifest = 'package.json'): DeclaredPackage[] {
  const data: unknown = JSON.parse(stripBom(jsonText))
  const out: DeclaredPackage[] = []
  if (!isRecord(data)) return out

  for (const section of SECTIONS) {
    const deps = data[section]
    if (!isRecord(deps)) continue
    for (const [name, spec] of Object.entries(deps)) {
      // workspace entries with object specifiers are not installable names
      if (!name || typeof spec !== 'string') continue
      out.push({ name, constraint: spec.trim() || undefined, ecosystem: 'npm', manifest })
    }
  }
  return out
}

export function readPackageVersion(jsonText: string): string | undefined {
  const data: unknown = JSON.parse(stripBom(jsonText))
  return isRecord(data) && typeof data.version === 'string' ? data.version : undefined
}
