import fs from 'node:fs'
import path from 'node:path'
import { parseComposerJson } from '../parsers/composer/composer-json.js'
import { parseProfileManifests } from './handler.js'
import type { EcosystemHandler } from './handler.js'

export const composerHandler: EcosystemHandler = {
  id: 'composer',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, { 'composer.json': parseComposerJson })
  },

  createDetector(ctx) {
    return {
      // vendor/<vendor>/<package>
      isInstalled: pkg => fs.existsSync(path.join(ctx.root, ctx.profile.installRoot, ...pkg.name.split('/')))
    }
  }
}
