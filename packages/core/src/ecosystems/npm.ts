import fs from 'node:fs'
import path from 'node:path'
import { parsePackageJson, readPackageVersion } from '../parsers/npm/package-json.js'
import { parseProfileManifests, readOptional } from './handler.js'
import type { EcosystemHandler, HandlerContext } from './handler.js'

// @scope/name resolves to node_modules/@scope/name
function packageDir(ctx: HandlerContext, name: string): string {
  return path.join(ctx.root, ctx.profile.installRoot, ...name.split('/'))
}

export const npmHandler: EcosystemHandler = {
  id: 'npm',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, { 'package.json': parsePackageJson })
  },

  createDetector(ctx) {
    return {
      isInstalled: pkg => fs.existsSync(packageDir(ctx, pkg.name)),
      installedVersion: pkg => {
        const rel = path.relative(ctx.root, path.join(packageDir(ctx, pkg.name), 'package.json'))
        const text = readOptional(ctx.root, rel, ctx.logger)
        if (text === undefined) return undefined
        try {
          return readPackageVersion(text)
        } catch (err) {
          ctx.logger.debug({ err, package: pkg.name }, 'Unreadable installed package.json')
          return undefined
        }
      }
    }
  }
}
