import { parseGemfile } from '../parsers/gem/gemfile.js'
import { parseGemfileLock } from '../parsers/gem/gemfile-lock.js'
import { loadLock, parseProfileManifests } from './handler.js'
import type { EcosystemHandler } from './handler.js'

export const gemHandler: EcosystemHandler = {
  id: 'gem',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, { 'Gemfile': parseGemfile })
  },

  createDetector(ctx) {
    let lock: Map<string, string> | undefined
    const specs = () => (lock ??= loadLock(ctx, ctx.profile.installRoot, parseGemfileLock, new Map<string, string>()))
    return {
      isInstalled: pkg => specs().has(pkg.name),
      installedVersion: pkg => specs().get(pkg.name) || undefined
    }
  }
}
