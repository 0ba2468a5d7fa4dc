import type { DeclaredPackage } from '../../types.js'

const REQUIRE_LINE = /^require\s+(\S+)\s+(\S+)/
const BLOCK_ENTRY = /^(\S+)\s+(\S+)/

// Direct requirements only; `// indirect` entries belong to the module graph, not the manifest.
export function parseGoMod(text: string, manifest = 'go.mod'): DeclaredPackage[] {
  const out: DeclaredPackage[] = []
  let inBlock = false

  for (const raw of text.split(/\r?\n/)) {
    const indirect = /\/\/\s*indirect\b/.test(raw)
    const line = raw.replace(/\/\/.*$/, '').trim()
    if (!line) continue

    if (inBlock) {
      if (line === ')') { inBlock = false; continue }
      const m = line.match(BLOCK_ENTRY)
      if (m?.[1] && m[2] && !indirect) out.push({ name: m[1], constraint: m[2], ecosystem: 'go', manifest })
      continue
    }

    if (/^require\s*\($/.test(line)) { inBlock = true; continue }
    const m = line.match(REQUIRE_LINE)
    if (m?.[1] && m[2] && !indirect) out.push({ name: m[1], constraint: m[2], ecosystem: 'go', manifest })
  }
  return out
}
