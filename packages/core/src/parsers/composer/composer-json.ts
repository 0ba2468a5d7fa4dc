import type { DeclaredPackage } from '../../types.js'
import { isRecord } from '../../guards.js'
import { stripBom } from '../../normalize.js'

const SECTIONS = ['require', 'require-dev'] as const

// php, ext-* and lib-* are platform requirements, not vendor packages
function isPlatform(name: string): boolean {
  return name === 'php' || name === 'composer-plugin-api' || name.startsWith('ext-') || name.startsWith('lib-')
}

export function parseComposerJson(jsonText: string, manifest = 'composer.json'): DeclaredPackage[] {
  const data: unknown = JSON.parse(stripBom(jsonText))
  const out: DeclaredPackage[] = []
  if (!isRecord(data)) return out
  for (const section of SECTIONS) {
    const deps = data[section]
    if (!isRecord(deps)) continue
    for (const [name, spec] of Object.entries(deps)) {
      if (isPlatform(name) || typeof spec !== 'string') continue
      out.push({ name, constraint: spec, ecosystem: 'composer', manifest })
    }
  }
  return out
}
