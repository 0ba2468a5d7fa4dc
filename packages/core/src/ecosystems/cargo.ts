import { parseCargoLock } from '../parsers/cargo/cargo-lock.js'
import { parseCargoToml } from '../parsers/cargo/cargo-toml.js'
import { loadLock, parseProfileManifests } from './handler.js'
import type { EcosystemHandler } from './handler.js'

export const cargoHandler: EcosystemHandler = {
  id: 'cargo',

  parseManifests(ctx) {
    return parseProfileManifests(ctx, { 'Cargo.toml': parseCargoToml })
  },

  createDetector(ctx) {
    let lock: Map<string, string> | undefined
    const locked = () => (lock ??= loadLock(ctx, ctx.profile.installRoot, parseCargoLock, new Map<string, string>()))
    return {
      isInstalled: pkg => locked().has(pkg.name),
      installedVersion: pkg => locked().get(pkg.name) || undefined
    }
  },

  // crates are imported with underscores
  importNames: name => [name.replace(/-/g, '_')]
}
