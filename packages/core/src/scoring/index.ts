import type { Findings, ScoreBreakdown } from '../types.js'

const DEDUCTIONS = {
  critical: 15,
  // warning and info missing packages weigh the same
  missing: 5,
  outdated: 2,
  conflict: 10
} as const

export function computeScoreBreakdown(findings: Findings): ScoreBreakdown {
  let critical = 0
  let warning = 0

  for (const pkg of findings.missing) {
    if (pkg.severity === 'critical') critical += DEDUCTIONS.critical
    else warning += DEDUCTIONS.missing
  }

  const outdated = findings.outdated.length * DEDUCTIONS.outdated
  const conflicts = findings.conflicts.length * DEDUCTIONS.conflict

  // single clamp at the end; the score saturates at 0
  const total = clamp(100 - critical - warning - outdated - conflicts, 0, 100)

  return {
    total,
    factors: { critical, warning, outdated, conflicts }
  }
}

export function computeHealthScore(findings: Findings): number {
  return computeScoreBreakdown(findings).total
}

function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n))
}
