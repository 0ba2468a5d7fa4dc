import { ConflictShapeError, InvalidSeverityError } from './errors.js'
import { computeHealthScore } from './scoring/index.js'
import { parseMajor } from './version.js'
import { SEVERITIES } from './types.js'
import type { Conflict, DependencyReport, Ecosystem, MissingPackage, OutdatedPackage, Severity } from './types.js'

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value)
}

export interface MissingPackageInit {
  name: string
  ecosystem: Ecosystem
  installCommand: string
  detectedFrom: string
  severity: unknown
}

/**
 * Builds a frozen MissingPackage.
 * @throws InvalidSeverityError when severity is not critical, warning or info
 */
export function createMissingPackage(init: MissingPackageInit): MissingPackage {
  if (!isSeverity(init.severity)) throw new InvalidSeverityError(init.severity)
  return Object.freeze({
    name: init.name,
    ecosystem: init.ecosystem,
    installCommand: init.installCommand,
    detectedFrom: init.detectedFrom,
    severity: init.severity
  })
}

export function escalate(pkg: MissingPackage): MissingPackage {
  if (pkg.severity === 'critical') return pkg
  return createMissingPackage({ ...pkg, severity: 'critical' })
}

export function createOutdatedPackage(init: OutdatedPackage): OutdatedPackage {
  return Object.freeze({ ...init })
}

export function isMajorUpdate(pkg: Pick<OutdatedPackage, 'currentVersion' | 'latestVersion'>): boolean {
  const current = parseMajor(pkg.currentVersion)
  const latest = parseMajor(pkg.latestVersion)
  if (current === undefined || latest === undefined) return false
  return latest > current
}

export function createConflict(init: { package: string; requiredBy: string[]; conflictingVersions: string[]; resolutionHint?: string }): Conflict {
  if (init.requiredBy.length !== init.conflictingVersions.length) {
    throw new ConflictShapeError(init.package, init.requiredBy.length, init.conflictingVersions.length)
  }
  return Object.freeze({
    package: init.package,
    requiredBy: Object.freeze([...init.requiredBy]),
    conflictingVersions: Object.freeze([...init.conflictingVersions]),
    resolutionHint: init.resolutionHint ?? ''
  })
}

export interface ReportInit {
  missing?: readonly MissingPackage[]
  outdated?: readonly OutdatedPackage[]
  unused?: readonly string[]
  conflicts?: readonly Conflict[]
  scannedAt?: string
}

export function createReport(init: ReportInit): DependencyReport {
  const missing = Object.freeze([...(init.missing ?? [])])
  const outdated = Object.freeze([...(init.outdated ?? [])])
  const conflicts = Object.freeze([...(init.conflicts ?? [])])
  return Object.freeze({
    missing,
    outdated,
    unused: Object.freeze([...(init.unused ?? [])]),
    conflicts,
    healthScore: computeHealthScore({ missing, outdated, conflicts }),
    scannedAt: init.scannedAt ?? new Date().toISOString()
  })
}

export function criticalCount(report: DependencyReport): number {
  return report.missing.filter(p => p.severity === 'critical').length
}

export function warningCount(report: DependencyReport): number {
  return report.missing.filter(p => p.severity === 'warning').length
}

export function hasCritical(report: DependencyReport): boolean {
  return report.missing.some(p => p.severity === 'critical')
}
