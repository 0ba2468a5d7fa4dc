import { parse as parseToml } from 'smol-toml'
import { isRecord } from '../../guards.js'

// name -> first locked version
export function parseCargoLock(tomlText: string): Map<string, string> {
  const doc = parseToml(tomlText)
  const out = new Map<string, string>()
  const packages = doc.package
  if (!Array.isArray(packages)) return out
  for (const pkg of packages) {
    if (!isRecord(pkg) || typeof pkg.name !== 'string') continue
    if (!out.has(pkg.name)) out.set(pkg.name, typeof pkg.version === 'string' ? pkg.version : '')
  }
  return out
}
