// Spec entries sit four spaces deep under a `specs:` heading; their own
// dependencies are indented six spaces and are skipped.
const SPEC_ENTRY = /^ {4}([^\s(]+)(?: \(([^)]*)\))?$/

export function parseGemfileLock(text: string): Map<string, string> {
  const out = new Map<string, string>()
  let inSpecs = false
  for (const line of text.split(/\r?\n/)) {
    if (/^\S/.test(line) || line.trim() === '') { inSpecs = false; continue }
    if (line.trim() === 'specs:') { inSpecs = true; continue }
    if (!inSpecs) continue
    const m = line.match(SPEC_ENTRY)
    if (m?.[1] && !out.has(m[1])) out.set(m[1], m[2] ?? '')
  }
  return out
}
