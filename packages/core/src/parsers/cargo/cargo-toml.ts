import { parse as parseToml } from 'smol-toml'
import type { DeclaredPackage } from '../../types.js'
import { isRecord } from '../../guards.js'

const SECTIONS = ['dependencies', 'dev-dependencies', 'build-dependencies'] as const

export function parseCargoToml(tomlText: string, manifest = 'Cargo.toml'): DeclaredPackage[] {
  const doc = parseToml(tomlText)
  const out: DeclaredPackage[] = []

  for (const section of SECTIONS) {
    const deps = doc[section]
    if (!isRecord(deps)) continue
    for (const [key, value] of Object.entries(deps)) {
      if (typeof value === 'string') {
        out.push({ name: key, constraint: value, ecosystem: 'cargo', manifest })
        continue
      }
      if (!isRecord(value)) continue
      // `foo = { package = "real-crate" }` renames the dependency
      const constraint = typeof value.version === 'string' ? value.version : undefined
      if (typeof value.package === 'string' && value.package !== key) {
        out.push({ name: value.package, constraint, ecosystem: 'cargo', manifest, alias: key })
      } else {
        out.push({ name: key, constraint, ecosystem: 'cargo', manifest })
      }
    }
  }
  return out
}
