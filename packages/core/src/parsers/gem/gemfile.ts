import type { DeclaredPackage } from '../../types.js'

// gem "rails", "~> 7.1"  /  gem 'pg', '>= 1.1', require: false
const GEM_LINE = /^\s*gem\s*\(?\s*['"]([^'"]+)['"]\s*(?:,\s*['"]([^'"]+)['"])?/

export function parseGemfile(text: string, manifest = 'Gemfile'): DeclaredPackage[] {
  const out: DeclaredPackage[] = []
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/#.*$/, '')
    const m = line.match(GEM_LINE)
    if (!m?.[1]) continue
    out.push({ name: m[1], constraint: m[2], ecosystem: 'gem', manifest })
  }
  return out
}
