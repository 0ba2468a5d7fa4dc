import fs from 'node:fs'
import path from 'node:path'
import { DEFAULT_TTL_MS, ScanCache, readMtimes } from './cache/scan-cache.js'
import { loadWorkspaceConfig, type WorkspaceConfig } from './config.js'
import { DEFAULT_HANDLERS } from './ecosystems/index.js'
import type { EcosystemHandler, Environment, HandlerContext, InstallationDetector } from './ecosystems/handler.js'
import { collectReferences, escalateSeverities } from './imports/index.js'
import { createLogger, type Logger } from './logger.js'
import { createMissingPackage, createOutdatedPackage, createReport, criticalCount } from './models.js'
import { dedupeDeclared, normalizeName } from './normalize.js'
import { ECOSYSTEM_PROFILES, renderCommand, watchedFiles } from './registry/profiles.js'
import { formatQuickStatus, planInstallCommands } from './render/markdown.js'
import { compareVersions, parseVersionFloor } from './version.js'
import type { CacheState, DeclaredPackage, DependencyReport, Ecosystem, EcosystemProfile, MissingPackage, OutdatedPackage } from './types.js'

export interface EngineOptions {
  ttlMs?: number
  // ecosystem ids to leave out of the scan
  skip?: Iterable<string>
  // package names never reported
  ignore?: Iterable<string>
  sourceExcludes?: readonly string[]
  profiles?: readonly EcosystemProfile[]
  handlers?: readonly EcosystemHandler[]
  logger?: Logger
  now?: () => number
  // environment detectors read (active virtualenv and the like); defaults to process.env
  env?: Environment
  // read .dephealth.yml from the root (default true)
  loadConfig?: boolean
}

/**
 * Dependency health for one repository root. Owns the scan cache for that
 * root; construct one engine per root.
 */
export class DependencyHealthEngine {
  readonly root: string
  private readonly cache: ScanCache
  private readonly profiles: readonly EcosystemProfile[]
  private readonly handlers: ReadonlyMap<Ecosystem, EcosystemHandler>
  private readonly ignore: ReadonlySet<string>
  private readonly sourceExcludes: readonly string[]
  private readonly logger: Logger
  private readonly now: () => number
  private readonly env: Environment

  constructor(root: string, options: EngineOptions = {}) {
    this.root = path.resolve(root)
    this.logger = options.logger ?? createLogger()
    this.now = options.now ?? Date.now
    this.env = options.env ?? process.env

    const file: WorkspaceConfig = options.loadConfig === false ? {} : loadWorkspaceConfig(this.root, this.logger)
    const ttlMs = options.ttlMs ?? (file.ttlSeconds !== undefined ? file.ttlSeconds * 1000 : DEFAULT_TTL_MS)
    const skip = new Set<string>(options.skip ?? file.skip ?? [])

    this.cache = new ScanCache(ttlMs)
    this.profiles = (options.profiles ?? Object.values(ECOSYSTEM_PROFILES)).filter(p => !skip.has(p.id))
    this.handlers = new Map((options.handlers ?? DEFAULT_HANDLERS).map(h => [h.id, h] as const))
    this.ignore = new Set([...(options.ignore ?? file.ignore ?? [])].map(normalizeName))
    this.sourceExcludes = options.sourceExcludes ?? file.sourceExcludes ?? []
  }

  get ttlMs(): number {
    return this.cache.ttlMs
  }

  /** Cached report while fresh, otherwise a full scan. */
  getReport(): DependencyReport {
    const mtimes = readMtimes(this.root, watchedFiles(this.profiles))
    const cached = this.cache.lookup(mtimes, this.now())
    if (cached) return cached
    return this.runScan(mtimes)
  }

  scan(): DependencyReport {
    return this.runScan(readMtimes(this.root, watchedFiles(this.profiles)))
  }

  invalidate(): void {
    this.cache.invalidate()
    this.logger.debug({ root: this.root }, 'Scan cache invalidated')
  }

  state(): CacheState {
    return this.cache.state(readMtimes(this.root, watchedFiles(this.profiles)), this.now())
  }

  isFresh(): boolean {
    return this.state() === 'fresh'
  }

  detectMissingPackages(): readonly MissingPackage[] {
    return this.getReport().missing
  }

  suggestInstallCommands(): string[] {
    return planInstallCommands(this.getReport().missing, this.profileLookup())
  }

  quickStatus(): string {
    return formatQuickStatus(this.getReport())
  }

  profileLookup(): Partial<Record<Ecosystem, EcosystemProfile>> {
    const lookup: Partial<Record<Ecosystem, EcosystemProfile>> = {}
    for (const p of this.profiles) lookup[p.id] = p
    return lookup
  }

  private runScan(mtimes: Record<string, number | null>): DependencyReport {
    const started = this.now()
    const missing: MissingPackage[] = []
    const outdated: OutdatedPackage[] = []
    const aliases = new Map<MissingPackage, readonly string[]>()

    for (const profile of this.profiles) {
      const handler = this.handlers.get(profile.id)
      if (!handler) {
        this.logger.debug({ ecosystem: profile.id }, 'Ecosystem not supported; skipped')
        continue
      }
      if (!profile.manifests.some(m => fs.existsSync(path.join(this.root, m)))) continue

      const ctx: HandlerContext = { root: this.root, profile, logger: this.logger, env: this.env }
      const declared = dedupeDeclared(handler.parseManifests(ctx))
        .filter(d => !this.ignore.has(normalizeName(d.name)))
      const detector = handler.createDetector(ctx)

      for (const pkg of declared) {
        if (!detector.isInstalled(pkg)) {
          const entry = createMissingPackage({
            name: pkg.name,
            ecosystem: pkg.ecosystem,
            installCommand: renderCommand(profile.installCommand, pkg.name),
            detectedFrom: pkg.manifest,
            severity: 'warning'
          })
          missing.push(entry)
          if (pkg.alias) aliases.set(entry, [pkg.alias])
          continue
        }
        const behind = findOutdated(pkg, detector, profile)
        if (behind) outdated.push(behind)
      }
      this.logger.debug({ ecosystem: profile.id, declared: declared.length }, 'Ecosystem scanned')
    }

    // source references only matter when something is missing
    const findings = missing.length
      ? escalateSeverities(missing, collectReferences(this.root, { excludes: this.sourceExcludes, logger: this.logger }), this.handlers, aliases)
      : missing

    const report = createReport({ missing: findings, outdated, scannedAt: new Date(started).toISOString() })
    this.cache.store(report, mtimes, this.now())
    this.logger.info({
      root: this.root,
      missing: report.missing.length,
      critical: criticalCount(report),
      outdated: report.outdated.length,
      score: report.healthScore
    }, 'Dependency scan complete')
    return report
  }
}

/**
 * An installed package is behind when its installed version compares lower
 * than the numeric floor of its declared constraint.
 */
export function findOutdated(pkg: DeclaredPackage, detector: InstallationDetector, profile: EcosystemProfile): OutdatedPackage | undefined {
  if (!pkg.constraint || !detector.installedVersion) return undefined
  // upper bounds and exclusions say nothing about a minimum
  if (/^\s*[<!]/.test(pkg.constraint)) return undefined
  const floor = parseVersionFloor(pkg.constraint)
  const installed = detector.installedVersion(pkg)
  const current = installed ? parseVersionFloor(installed) : undefined
  if (!floor || !installed || !current) return undefined
  if (compareVersions(current, floor) >= 0) return undefined

  const latest = floor.join('.')
  return createOutdatedPackage({
    name: pkg.name,
    ecosystem: pkg.ecosystem,
    currentVersion: installed,
    latestVersion: latest,
    updateCommand: renderCommand(profile.updateCommand, pkg.name, latest)
  })
}
