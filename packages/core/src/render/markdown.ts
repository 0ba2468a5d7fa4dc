import { ECOSYSTEM_PROFILES, renderCommand } from '../registry/profiles.js'
import { criticalCount, warningCount } from '../models.js'
import type { DependencyReport, Ecosystem, EcosystemProfile, MissingPackage } from '../types.js'

type ProfileLookup = Partial<Record<Ecosystem, EcosystemProfile>>

/**
 * Groups missing packages by ecosystem (in order of first appearance).
 * Ecosystems that accept several packages per command get one batched
 * command; the others get one command per package.
 */
export function planInstallCommands(missing: readonly MissingPackage[], profiles: ProfileLookup = ECOSYSTEM_PROFILES): string[] {
  const byEcosystem = new Map<Ecosystem, MissingPackage[]>()
  for (const pkg of missing) {
    const list = byEcosystem.get(pkg.ecosystem) ?? []
    list.push(pkg)
    byEcosystem.set(pkg.ecosystem, list)
  }

  const commands: string[] = []
  for (const [ecosystem, pkgs] of byEcosystem) {
    const profile = profiles[ecosystem]
    if (profile?.batchInstall) {
      commands.push(renderCommand(profile.installCommand, pkgs.map(p => p.name).join(' ')))
    } else {
      commands.push(...pkgs.map(p => p.installCommand))
    }
  }
  return commands
}

export function formatQuickStatus(report: DependencyReport): string {
  const critical = criticalCount(report)
  const warnings = warningCount(report)
  const head = `Health: ${report.healthScore}/100`
  if (critical === 0 && warnings === 0) return `${head} | All dependencies OK`

  const parts: string[] = []
  if (critical > 0) parts.push(`${critical} critical`)
  if (warnings > 0) parts.push(`${warnings} warnings`)
  return `${head} | ${parts.join(', ')}`
}

export function formatDependencyReport(report: DependencyReport, profiles?: ProfileLookup): string {
  const lines = ['# Dependency Status']
  const critical = report.missing.filter(p => p.severity === 'critical')
  const warning = report.missing.filter(p => p.severity === 'warning')

  if (critical.length) {
    lines.push('', '## Critical (Blocks Execution)')
    for (const pkg of critical) {
      lines.push('', `- **${pkg.name}** (${pkg.ecosystem})`, `  - Source: \`${pkg.detectedFrom}\``)
      lines.push('  ```bash', `  ${pkg.installCommand}`, '  ```')
    }
  }

  if (warning.length) {
    lines.push('', '## Warning (Should Install)')
    for (const pkg of warning) {
      lines.push('', `- **${pkg.name}** (${pkg.ecosystem})`)
      lines.push('  ```bash', `  ${pkg.installCommand}`, '  ```')
    }
  }

  if (report.outdated.length) {
    lines.push('', '## Outdated')
    for (const pkg of report.outdated) {
      lines.push(`- **${pkg.name}** (${pkg.ecosystem}): ${pkg.currentVersion} → ${pkg.latestVersion} (\`${pkg.updateCommand}\`)`)
    }
  }

  const fix = planInstallCommands([...critical, ...warning], profiles)
  if (fix.length) {
    lines.push('', '## Quick Fix', '```bash', ...fix, '```')
  }

  lines.push('', `## Health Score: ${report.healthScore}/100`)
  return lines.join('\n')
}

export function formatHealthReport(report: DependencyReport, profiles?: ProfileLookup): string {
  const lines = ['# Workspace Health', '', `**Score:** ${report.healthScore}/100`]

  if (!report.missing.length) {
    lines.push('', 'All dependencies are installed.')
    return lines.join('\n')
  }

  const critical = criticalCount(report)
  const warnings = report.missing.length - critical
  if (critical > 0) lines.push('', `**Critical Issues:** ${critical}`)
  if (warnings > 0) lines.push('', `**Warnings:** ${warnings}`)

  const commands = planInstallCommands(report.missing, profiles).slice(0, 3)
  if (commands.length) lines.push('', '**Quick Fix:**', '```bash', ...commands, '```')
  return lines.join('\n')
}
