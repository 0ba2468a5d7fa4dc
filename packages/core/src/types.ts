export type Ecosystem = 'npm' | 'pip' | 'go' | 'cargo' | 'gem' | 'composer'

export const SEVERITIES = ['critical', 'warning', 'info'] as const
export type Severity = typeof SEVERITIES[number]

export interface EcosystemProfile {
  readonly id: Ecosystem
  readonly displayName: string
  readonly manifests: readonly string[]
  readonly lockFiles: readonly string[]
  // relative to the repository root
  readonly installRoot: string
  readonly installCommand: string
  readonly checkCommand: string
  readonly updateCommand: string
  readonly batchInstall: boolean
}

export interface DeclaredPackage {
  name: string
  constraint?: string
  ecosystem: Ecosystem
  manifest: string
  // local name the manifest gives a renamed dependency
  alias?: string
}

export interface MissingPackage {
  readonly name: string
  readonly ecosystem: Ecosystem
  readonly installCommand: string
  readonly detectedFrom: string
  readonly severity: Severity
}

export interface OutdatedPackage {
  readonly name: string
  readonly ecosystem: Ecosystem
  readonly currentVersion: string
  readonly latestVersion: string
  readonly updateCommand: string
}

export interface Conflict {
  readonly package: string
  readonly requiredBy: readonly string[]
  readonly conflictingVersions: readonly string[]
  readonly resolutionHint: string
}

export interface Findings {
  missing: readonly MissingPackage[]
  outdated: readonly OutdatedPackage[]
  conflicts: readonly Conflict[]
}

export interface DependencyReport extends Findings {
  readonly unused: readonly string[]
  readonly healthScore: number
  readonly scannedAt: string
}

export interface ScoreBreakdown {
  total: number
  factors: {
    critical: number
    warning: number
    outdated: number
    conflicts: number
  }
}

// null marks a watched file that did not exist at scan time
export type MtimeMap = Record<string, number | null>

export interface ScanCacheEntry {
  readonly report: DependencyReport
  readonly scannedAt: number
  readonly mtimes: Readonly<MtimeMap>
}

export type CacheState = 'fresh' | 'stale'
