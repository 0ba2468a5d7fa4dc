import { cargoHandler } from './cargo.js'
import { composerHandler } from './composer.js'
import { gemHandler } from './gem.js'
import { goHandler } from './go.js'
import { npmHandler } from './npm.js'
import { pipHandler } from './pip.js'
import type { EcosystemHandler } from './handler.js'

export const DEFAULT_HANDLERS: readonly EcosystemHandler[] = Object.freeze([
  npmHandler,
  pipHandler,
  goHandler,
  cargoHandler,
  gemHandler,
  composerHandler
])

export { npmHandler, pipHandler, goHandler, cargoHandler, gemHandler, composerHandler }
export { parseProfileManifests, readOptional, loadLock } from './handler.js'
export type { Environment, EcosystemHandler, HandlerContext, InstallationDetector, ManifestParser } from './handler.js'
