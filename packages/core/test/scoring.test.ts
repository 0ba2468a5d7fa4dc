import { describe, it, expect } from 'vitest'
import { computeHealthScore, computeScoreBreakdown } from '../src/scoring/index.js'
import { createConflict, createMissingPackage, createOutdatedPackage, createReport } from '../src/models.js'
import type { MissingPackage, Severity } from '../src/types.js'

const missing = (name: string, severity: Severity): MissingPackage => createMissingPackage({
  name,
  ecosystem: 'npm',
  installCommand: `npm install ${name}`,
  detectedFrom: 'package.json',
  severity
})

const outdated = createOutdatedPackage({
  name: 'react',
  ecosystem: 'npm',
  currentVersion: '17.0.0',
  latestVersion: '18.2.0',
  updateCommand: 'npm install react@18.2.0'
})

describe('computeHealthScore', () => {
  it('starts at 100 with no findings', () => {
    expect(computeHealthScore({ missing: [], outdated: [], conflicts: [] })).toBe(100)
  })

  it('deducts 15 per critical, 5 per warning and 2 per outdated package', () => {
    const score = computeHealthScore({
      missing: [missing('a', 'critical'), missing('b', 'critical'), missing('c', 'warning')],
      outdated: [outdated],
      conflicts: []
    })
    expect(score).toBe(63) // 100 - 15*2 - 5*1 - 2*1
  })

  it('weighs info the same as warning', () => {
    expect(computeHealthScore({ missing: [missing('a', 'info')], outdated: [], conflicts: [] })).toBe(95)
  })

  it('deducts 10 per conflict', () => {
    const conflict = createConflict({ package: 'lodash', requiredBy: ['a', 'b'], conflictingVersions: ['^3', '^4'] })
    expect(computeHealthScore({ missing: [], outdated: [], conflicts: [conflict] })).toBe(90)
  })

  it('clamps at 0 however large the deductions', () => {
    const many = Array.from({ length: 20 }, (_, i) => missing(`p${i}`, 'critical'))
    expect(computeHealthScore({ missing: many, outdated: [], conflicts: [] })).toBe(0)
  })

  it('drops by exactly 15 per added critical until clamped', () => {
    const list: MissingPackage[] = []
    let previous = computeHealthScore({ missing: list, outdated: [], conflicts: [] })
    for (let i = 0; i < 8; i++) {
      list.push(missing(`p${i}`, 'critical'))
      const next = computeHealthScore({ missing: list, outdated: [], conflicts: [] })
      expect(next).toBe(Math.max(0, previous - 15))
      previous = next
    }
    expect(previous).toBe(0)
  })

  it('stores the same score on a report built from those findings', () => {
    const report = createReport({
      missing: [missing('a', 'critical'), missing('b', 'critical'), missing('c', 'warning')],
      outdated: [outdated]
    })
    expect(report.healthScore).toBe(63)
  })

  it('stays within 0..100', () => {
    const conflict = createConflict({ package: 'x', requiredBy: ['a'], conflictingVersions: ['^1'] })
    const heavy = { missing: [missing('a', 'critical')], outdated: [outdated], conflicts: Array.from({ length: 12 }, () => conflict) }
    expect(computeHealthScore(heavy)).toBe(0)
    expect(computeHealthScore({ missing: [], outdated: [], conflicts: [] })).toBe(100)
  })

  it('is idempotent', () => {
    const findings = { missing: [missing('a', 'warning')], outdated: [outdated], conflicts: [] }
    expect(computeHealthScore(findings)).toBe(computeHealthScore(findings))
  })
})

describe('computeScoreBreakdown', () => {
  it('reports the deduction per factor', () => {
    const breakdown = computeScoreBreakdown({
      missing: [missing('a', 'critical'), missing('b', 'warning'), missing('c', 'info')],
      outdated: [outdated, outdated],
      conflicts: []
    })
    expect(breakdown).toEqual({
      total: 71,
      factors: { critical: 15, warning: 10, outdated: 4, conflicts: 0 }
    })
  })
})
