import { parse as parseToml } from 'smol-toml'
import type { DeclaredPackage } from '../../types.js'
import { isRecord, stringArray } from '../../guards.js'
import { parseRequirement } from './requirements.js'

// [project].dependencies (PEP 621) and [tool.poetry.dependencies]
export function parsePyproject(tomlText: string, manifest = 'pyproject.toml'): DeclaredPackage[] {
  const doc = parseToml(tomlText)
  const out: DeclaredPackage[] = []

  const project = doc.project
  if (isRecord(project)) {
    for (const spec of stringArray(project.dependencies) ?? []) {
      const req = parseRequirement(spec)
      if (req) out.push({ ...req, ecosystem: 'pip', manifest })
    }
  }

  const tool = doc.tool
  const poetry = isRecord(tool) ? tool.poetry : undefined
  const poetryDeps = isRecord(poetry) ? poetry.dependencies : undefined
  if (isRecord(poetryDeps)) {
    for (const [name, value] of Object.entries(poetryDeps)) {
      if (name.toLowerCase() === 'python') continue
      out.push({ name, constraint: poetryConstraint(value), ecosystem: 'pip', manifest })
    }
  }
  return out
}

function poetryConstraint(value: unknown): string | undefined {
  if (typeof value === 'string') return value === '*' ? undefined : value
  if (isRecord(value) && typeof value.version === 'string') return value.version
  return undefined
}
