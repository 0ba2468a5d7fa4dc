import type { DeclaredPackage } from '../../types.js'
import { splitConstraint } from '../../normalize.js'

export interface Requirement {
  name: string
  constraint?: string
}

/**
 * Parses one PEP 508 style requirement such as `requests[socks]>=2.31; python_version > "3.8"`.
 * Extras, environment markers and direct references are dropped.
 */
export function parseRequirement(spec: string): Requirement | undefined {
  let s = spec
  const marker = s.indexOf(';')
  if (marker >= 0) s = s.slice(0, marker)
  const direct = s.indexOf(' @')
  if (direct >= 0) s = s.slice(0, direct)
  s = s.replace(/\[[^\]]*\]/g, '').replace(/[()]/g, '').trim()

  const { name, constraint } = splitConstraint(s)
  if (!name || /\s/.test(name) || name.toLowerCase() === 'python') return undefined
  return { name, constraint: constraint?.replace(/\s+/g, '') }
}

export function parseRequirementsTxt(text: string, manifest = 'requirements.txt'): DeclaredPackage[] {
  const out: DeclaredPackage[] = []
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/\s+#.*$/, '').trim()
    // -r, -e, --index-url and friends
    if (!line || line.startsWith('#') || line.startsWith('-')) continue
    const req = parseRequirement(line)
    if (req) out.push({ ...req, ecosystem: 'pip', manifest })
  }
  return out
}
