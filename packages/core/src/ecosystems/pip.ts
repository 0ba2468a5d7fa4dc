import fs from 'node:fs'
import path from 'node:path'
import { normalizeName } from '../normalize.js'
import { parsePyproject } from '../parsers/pip/pyproject.js'
import { parseRequirementsTxt } from '../parsers/pip/requirements.js'
import { parseProfileManifests } from './handler.js'
import type { EcosystemHandler, HandlerContext } from './handler.js'

// Distributions whose top-level module name differs from the distribution name.
const IMPORT_NAMES: Record<string, string> = {
  'pillow': 'PIL',
  'beautifulsoup4': 'bs4',
  'pyyaml': 'yaml',
  'scikit-learn': 'sklearn',
  'opencv-python': 'cv2',
  'opencv-python-headless': 'cv2',
  'python-dateutil': 'dateutil',
  'typing-extensions': 'typing_extensions',
  'protobuf': 'google',
  'attrs': 'attr'
}

export function pythonImportNames(name: string): string[] {
  const mapped = IMPORT_NAMES[normalizeName(name)]
  return mapped ? [mapped, name] : [name.replace(/-/g, '_'), name]
}

const VENV_DIRS = ['.venv', 'venv'] as const
// activated virtualenv or conda environment, which may live outside the repository
const ENV_PREFIXES = ['VIRTUAL_ENV', 'CONDA_PREFIX'] as const

// Interpreter prefixes to search: in-repo virtualenvs first, then active environments.
function environmentPrefixes(ctx: HandlerContext): string[] {
  const prefixes = VENV_DIRS.map(v => path.join(ctx.root, v))
  for (const key of ENV_PREFIXES) {
    const value = ctx.env[key]?.trim()
    if (value) prefixes.push(path.resolve(ctx.root, value))
  }
  return prefixes
}

function sitePackagesDirs(ctx: HandlerContext): string[] {
  const out: string[] = []
  const add = (site: string) => {
    if (!out.includes(site) && fs.existsSync(site)) out.push(site)
  }
  const prefixes = environmentPrefixes(ctx)
  const libDirs = [path.join(ctx.root, ctx.profile.installRoot), ...prefixes.map(p => path.join(p, 'lib'))]

  for (const lib of new Set(libDirs.map(p => path.normalize(p)))) {
    let entries: string[] = []
    try {
      if (fs.existsSync(lib)) entries = fs.readdirSync(lib)
    } catch (err) {
      ctx.logger.debug({ err, dir: lib }, 'Unreadable interpreter lib directory')
    }
    for (const entry of entries) {
      if (entry.startsWith('python')) add(path.join(lib, entry, 'site-packages'))
    }
  }
  // Windows layout
  for (const prefix of prefixes) add(path.join(prefix, 'Lib', 'site-packages'))
  return out
}

interface SitePackagesIndex {
  modules: Set<string>
  // normalized distribution name -> version
  dists: Map<string, string>
}

// versions start with a digit, so `my-pkg.egg-info` is the distribution `my-pkg`
const DIST_INFO = /^(.+?)(?:-(\d[^-]*))?(?:-py[\d.]+)?\.(?:dist-info|egg-info)$/

function indexSitePackages(ctx: HandlerContext): SitePackagesIndex {
  const index: SitePackagesIndex = { modules: new Set(), dists: new Map() }
  for (const site of sitePackagesDirs(ctx)) {
    let entries: string[] = []
    try {
      entries = fs.readdirSync(site)
    } catch (err) {
      ctx.logger.debug({ err, dir: site }, 'Unreadable site-packages')
      continue
    }
    for (const entry of entries) {
      const dist = entry.match(DIST_INFO)
      if (dist?.[1]) {
        const key = normalizeName(dist[1])
        if (!index.dists.has(key)) index.dists.set(key, dist[2] ?? '')
        continue
      }
      index.modules.add(normalizeName(entry.replace(/\.py$/, '')))
    }
  }
  return index
}

export const pipHandler: EcosystemHandler = {
  id: 'pip',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, {
      'pyproject.toml': parsePyproject,
      'requirements.txt': parseRequirementsTxt
    })
  },

  createDetector(ctx) {
    let index: SitePackagesIndex | undefined
    const site = () => (index ??= indexSitePackages(ctx))
    return {
      isInstalled: pkg => {
        const { modules, dists } = site()
        if (dists.has(normalizeName(pkg.name))) return true
        return pythonImportNames(pkg.name).some(n => modules.has(normalizeName(n)))
      },
      installedVersion: pkg => site().dists.get(normalizeName(pkg.name)) || undefined
    }
  },

  importNames: pythonImportNames
}
