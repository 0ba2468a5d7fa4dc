// Best-effort, regex based. Each extractor returns raw package identifiers
// (not yet normalized) referenced by one source file.

import type { Ecosystem } from '../types.js'

export type Extractor = (source: string) => string[]

const JS_PATTERNS = [
  /(?:import|export)\s[^'";]*?\sfrom\s*['"]([^'"]+)['"]/g,
  /import\s*['"]([^'"]+)['"]/g,
  /(?:require|import)\s*\(\s*['"]([^'"]+)['"]\s*\)/g
]

export function jsPackageName(specifier: string): string | undefined {
  if (!specifier || specifier.startsWith('.') || specifier.startsWith('/') || specifier.startsWith('#')) return undefined
  // node:fs, https://..., virtual:...
  if (specifier.includes(':')) return undefined
  const parts = specifier.split('/')
  if (specifier.startsWith('@')) return parts.length >= 2 && parts[1] ? `${parts[0]}/${parts[1]}` : undefined
  return parts[0]
}

export const extractJs: Extractor = source => {
  const out: string[] = []
  for (const re of JS_PATTERNS) {
    for (const m of source.matchAll(re)) {
      const name = jsPackageName(m[1] ?? '')
      if (name) out.push(name)
    }
  }
  return out
}

const PY_FROM = /^\s*from\s+([A-Za-z_][\w.]*)\s+import\b/gm
const PY_IMPORT = /^\s*import\s+([^\n#;]+)/gm

export const extractPython: Extractor = source => {
  const out: string[] = []
  for (const m of source.matchAll(PY_FROM)) {
    const top = m[1]?.split('.')[0]
    if (top) out.push(top)
  }
  for (const m of source.matchAll(PY_IMPORT)) {
    for (const part of (m[1] ?? '').split(',')) {
      // `import a.b as c`
      const top = part.trim().split(/\s+/)[0]?.split('.')[0]
      if (top && /^[A-Za-z_]\w*$/.test(top)) out.push(top)
    }
  }
  return out
}

const GO_SINGLE = /^\s*import\s+(?:[\w.]+\s+)?"([^"]+)"/gm
const GO_BLOCK = /^\s*import\s*\(([\s\S]*?)\)/gm
const GO_QUOTED = /"([^"]+)"/g

// A module path matches any import beneath it, so every prefix is recorded.
function goPrefixes(importPath: string): string[] {
  const parts = importPath.split('/')
  return parts.map((_, i) => parts.slice(0, i + 1).join('/'))
}

export const extractGo: Extractor = source => {
  const out: string[] = []
  for (const m of source.matchAll(GO_SINGLE)) out.push(...goPrefixes(m[1] ?? ''))
  for (const block of source.matchAll(GO_BLOCK)) {
    for (const m of (block[1] ?? '').matchAll(GO_QUOTED)) out.push(...goPrefixes(m[1] ?? ''))
  }
  return out.filter(Boolean)
}

const RUST_USE = /^\s*(?:pub(?:\([^)]*\))?\s+)?use\s+:*([A-Za-z_]\w*)/gm
const RUST_EXTERN = /^\s*extern\s+crate\s+([A-Za-z_]\w*)/gm
const RUST_BUILTIN = new Set(['crate', 'self', 'super', 'std', 'core', 'alloc'])

export const extractRust: Extractor = source => {
  const out: string[] = []
  for (const re of [RUST_USE, RUST_EXTERN]) {
    for (const m of source.matchAll(re)) {
      const name = m[1]
      if (name && !RUST_BUILTIN.has(name)) out.push(name)
    }
  }
  return out
}

const RUBY_REQUIRE = /^\s*require\s*\(?\s*['"]([^'"]+)['"]/gm

export const extractRuby: Extractor = source => {
  const out: string[] = []
  for (const m of source.matchAll(RUBY_REQUIRE)) {
    const top = m[1]?.split('/')[0]
    if (top) out.push(top)
  }
  return out
}

export interface SourceLanguage {
  // ecosystem whose packages this language imports
  ecosystem: Ecosystem
  extract: Extractor
}

const js: SourceLanguage = { ecosystem: 'npm', extract: extractJs }

export const EXTRACTORS: Record<string, SourceLanguage> = {
  '.js': js,
  '.jsx': js,
  '.ts': js,
  '.tsx': js,
  '.mjs': js,
  '.cjs': js,
  '.py': { ecosystem: 'pip', extract: extractPython },
  '.go': { ecosystem: 'go', extract: extractGo },
  '.rs': { ecosystem: 'cargo', extract: extractRust },
  '.rb': { ecosystem: 'gem', extract: extractRuby }
}
