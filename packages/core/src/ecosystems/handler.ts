import fs from 'node:fs'
import path from 'node:path'
import type { Logger } from '../logger.js'
import { stripBom } from '../normalize.js'
import type { DeclaredPackage, Ecosystem, EcosystemProfile } from '../types.js'

export type Environment = Readonly<Record<string, string | undefined>>

export interface HandlerContext {
  root: string
  profile: EcosystemProfile
  logger: Logger
  // process environment; detectors read interpreter locations from it
  env: Environment
}

export interface InstallationDetector {
  isInstalled(pkg: DeclaredPackage): boolean
  installedVersion?(pkg: DeclaredPackage): string | undefined
}

/**
 * One implementation per ecosystem, registered in the handler table by id.
 * New ecosystems plug in by adding a profile and a handler.
 */
export interface EcosystemHandler {
  readonly id: Ecosystem
  parseManifests(ctx: HandlerContext): DeclaredPackage[]
  createDetector(ctx: HandlerContext): InstallationDetector
  // names the package is imported under, when they differ from the declared name
  importNames?(name: string): string[]
}

export type ManifestParser = (text: string, manifest: string) => DeclaredPackage[]

export function readOptional(root: string, relative: string, logger: Logger): string | undefined {
  const file = path.join(root, relative)
  if (!fs.existsSync(file)) return undefined
  try {
    return stripBom(fs.readFileSync(file, 'utf8'))
  } catch (err) {
    logger.warn({ err, file: relative }, 'Failed to read file')
    return undefined
  }
}

/**
 * Runs each manifest of the profile through its parser. A manifest that is
 * absent, empty or malformed contributes nothing; the others still count.
 */
export function parseProfileManifests(ctx: HandlerContext, parsers: Record<string, ManifestParser>): DeclaredPackage[] {
  const out: DeclaredPackage[] = []
  for (const manifest of ctx.profile.manifests) {
    const parse = parsers[manifest]
    if (!parse) continue
    const text = readOptional(ctx.root, manifest, ctx.logger)
    if (text === undefined || !text.trim()) continue
    try {
      out.push(...parse(text, manifest))
    } catch (err) {
      ctx.logger.warn({ err, manifest, ecosystem: ctx.profile.id }, 'Malformed manifest skipped')
    }
  }
  return out
}

// Reads and parses a lock file once; failures read as "nothing resolved".
export function loadLock<T>(ctx: HandlerContext, file: string, parse: (text: string) => T, empty: T): T {
  const text = readOptional(ctx.root, file, ctx.logger)
  if (text === undefined) return empty
  try {
    return parse(text)
  } catch (err) {
    ctx.logger.warn({ err, file, ecosystem: ctx.profile.id }, 'Malformed lock file ignored')
    return empty
  }
}
