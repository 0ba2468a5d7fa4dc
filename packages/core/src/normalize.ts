import type { DeclaredPackage } from './types.js'

// '-', '_' and '.' are interchangeable across ecosystems (PEP 503 style)
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-')
}

const OPERATOR = /[<>=!~^]/

export function splitConstraint(specifier: string): { name: string; constraint?: string } {
  const idx = specifier.search(OPERATOR)
  if (idx < 0) return { name: specifier.trim() }
  const constraint = specifier.slice(idx).trim()
  return { name: specifier.slice(0, idx).trim(), constraint: constraint || undefined }
}

// Keeps the first declaration of each name+ecosystem, in insertion order.
export function dedupeDeclared(list: DeclaredPackage[]): DeclaredPackage[] {
  const map = new Map<string, DeclaredPackage>()
  for (const d of list) {
    const key = `${d.ecosystem}:${normalizeName(d.name)}`
    if (!map.has(key)) map.set(key, d)
  }
  return [...map.values()]
}

// Editors on some platforms save UTF-8 with a byte-order mark; JSON.parse rejects it.
export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
}
