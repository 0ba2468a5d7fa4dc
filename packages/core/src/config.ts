import fs from 'node:fs'
import path from 'node:path'
import YAML from 'yaml'
import { isRecord, stringArray } from './guards.js'
import { stripBom } from './normalize.js'
import { isEcosystem } from './registry/profiles.js'
import { silentLogger, type Logger } from './logger.js'
import type { Ecosystem } from './types.js'

export const CONFIG_FILES = ['.dephealth.yml', '.dephealth.yaml'] as const

export interface WorkspaceConfig {
  ttlSeconds?: number
  skip?: Ecosystem[]
  ignore?: string[]
  sourceExcludes?: string[]
}

// Unknown keys and values of the wrong type are dropped.
export function parseWorkspaceConfig(yamlText: string): WorkspaceConfig {
  const doc: unknown = YAML.parse(yamlText)
  const config: WorkspaceConfig = {}
  if (!isRecord(doc)) return config

  if (typeof doc.ttlSeconds === 'number' && Number.isFinite(doc.ttlSeconds) && doc.ttlSeconds >= 0) {
    config.ttlSeconds = doc.ttlSeconds
  }
  const skip = stringArray(doc.skip)
  if (skip) config.skip = skip.filter(isEcosystem)
  const ignore = stringArray(doc.ignore)
  if (ignore) config.ignore = ignore
  const excludes = stringArray(doc.sourceExcludes)
  if (excludes) config.sourceExcludes = excludes
  return config
}

export function loadWorkspaceConfig(root: string, logger: Logger = silentLogger): WorkspaceConfig {
  for (const name of CONFIG_FILES) {
    const file = path.join(root, name)
    if (!fs.existsSync(file)) continue
    try {
      return parseWorkspaceConfig(stripBom(fs.readFileSync(file, 'utf8')))
    } catch (err) {
      logger.warn({ err, file: name }, 'Invalid workspace config ignored')
      return {}
    }
  }
  return {}
}
