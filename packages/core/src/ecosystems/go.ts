import { parseGoMod } from '../parsers/go/go-mod.js'
import { parseGoSum } from '../parsers/go/go-sum.js'
import { loadLock, parseProfileManifests } from './handler.js'
import type { EcosystemHandler } from './handler.js'

// Resolution evidence is the checksum file written by the module download.
export const goHandler: EcosystemHandler = {
  id: 'go',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, { 'go.mod': parseGoMod })
  },

  createDetector(ctx) {
    let sums: Map<string, string> | undefined
    const resolved = () => (sums ??= loadLock(ctx, ctx.profile.installRoot, parseGoSum, new Map<string, string>()))
    return {
      isInstalled: pkg => resolved().has(pkg.name)
    }
  }
}
