export * from './types.js'
export * from './errors.js'
export * from './models.js'
export * from './version.js'
export { normalizeName, splitConstraint, dedupeDeclared, stripBom } from './normalize.js'
export { ECOSYSTEM_PROFILES, getProfile, isEcosystem, renderCommand, watchedFiles } from './registry/profiles.js'
export * from './ecosystems/index.js'
export { parsePackageJson } from './parsers/npm/package-json.js'
export { parsePyproject } from './parsers/pip/pyproject.js'
export { parseRequirement, parseRequirementsTxt } from './parsers/pip/requirements.js'
export { parseGoMod } from './parsers/go/go-mod.js'
export { parseGoSum } from './parsers/go/go-sum.js'
export { parseCargoToml } from './parsers/cargo/cargo-toml.js'
export { parseCargoLock } from './parsers/cargo/cargo-lock.js'
export { parseGemfile } from './parsers/gem/gemfile.js'
export { parseGemfileLock } from './parsers/gem/gemfile-lock.js'
export { parseComposerJson } from './parsers/composer/composer-json.js'
export { collectReferences, escalateSeverities, EXCLUDED_DIRS, type ReferenceIndex } from './imports/index.js'
export { computeHealthScore, computeScoreBreakdown } from './scoring/index.js'
export { ScanCache, DEFAULT_TTL_MS, readMtimes, sameMtimes } from './cache/scan-cache.js'
export { loadWorkspaceConfig, parseWorkspaceConfig, CONFIG_FILES, type WorkspaceConfig } from './config.js'
export { createLogger, silentLogger, type Logger } from './logger.js'
export { formatDependencyReport, formatHealthReport, formatQuickStatus, planInstallCommands } from './render/markdown.js'
export { DependencyHealthEngine, findOutdated, type EngineOptions } from './engine.js'
