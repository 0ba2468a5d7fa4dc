import fs from 'node:fs'
import path from 'node:path'
import { globSync } from 'tinyglobby'
import { escalate } from '../models.js'
import { normalizeName } from '../normalize.js'
import { silentLogger, type Logger } from '../logger.js'
import type { EcosystemHandler } from '../ecosystems/handler.js'
import type { Ecosystem, MissingPackage } from '../types.js'
import { EXTRACTORS } from './extractors.js'

export const SOURCE_PATTERNS = ['**/*.{py,js,jsx,ts,tsx,mjs,cjs,go,rs,rb}']

// generated, vendored and environment directories
export const EXCLUDED_DIRS = [
  'node_modules', '.venv', 'venv', '__pycache__', '.git', 'dist', 'build',
  '.tox', '.eggs', 'target', 'vendor', 'coverage'
]

export const MAX_SOURCE_BYTES = 1024 * 1024

export interface ReferenceScanOptions {
  excludes?: readonly string[]
  maxFileBytes?: number
  logger?: Logger
}

// normalized package names referenced from source, per ecosystem
export type ReferenceIndex = ReadonlyMap<Ecosystem, ReadonlySet<string>>

/**
 * Collects the normalized names of every package referenced from source
 * files under `root`, keyed by the ecosystem of the file's language.
 * Unreadable or oversized files are skipped.
 */
export function collectReferences(root: string, options: ReferenceScanOptions = {}): Map<Ecosystem, Set<string>> {
  const logger = options.logger ?? silentLogger
  const maxBytes = options.maxFileBytes ?? MAX_SOURCE_BYTES
  const ignore = [...EXCLUDED_DIRS, ...(options.excludes ?? [])].map(dir => `**/${dir}/**`)
  const refs = new Map<Ecosystem, Set<string>>()

  let files: string[]
  try {
    files = globSync(SOURCE_PATTERNS, { cwd: root, ignore, absolute: true, dot: true })
  } catch (err) {
    logger.warn({ err, root }, 'Source file discovery failed; no references collected')
    return refs
  }

  for (const file of files) {
    const language = EXTRACTORS[path.extname(file)]
    if (!language) continue
    let source: string
    try {
      if (fs.statSync(file).size > maxBytes) continue
      source = fs.readFileSync(file, 'utf8')
    } catch (err) {
      logger.debug({ err, file }, 'Unreadable source file skipped')
      continue
    }
    let names = refs.get(language.ecosystem)
    if (!names) {
      names = new Set()
      refs.set(language.ecosystem, names)
    }
    for (const name of language.extract(source)) names.add(normalizeName(name))
  }

  logger.debug({ files: files.length, ecosystems: refs.size }, 'Import references collected')
  return refs
}

/**
 * Raises missing packages that are referenced from source files of their own
 * ecosystem to critical. `aliases` holds extra import names for individual
 * packages, such as a renamed crate's table key. Never lowers a severity.
 */
export function escalateSeverities(
  missing: readonly MissingPackage[],
  references: ReferenceIndex,
  handlers: ReadonlyMap<Ecosystem, EcosystemHandler> = new Map(),
  aliases: ReadonlyMap<MissingPackage, readonly string[]> = new Map()
): MissingPackage[] {
  return missing.map(pkg => {
    const seen = references.get(pkg.ecosystem)
    if (!seen) return pkg
    const names = [
      pkg.name,
      ...(handlers.get(pkg.ecosystem)?.importNames?.(pkg.name) ?? []),
      ...(aliases.get(pkg) ?? [])
    ]
    return names.some(n => seen.has(normalizeName(n))) ? escalate(pkg) : pkg
  })
}
