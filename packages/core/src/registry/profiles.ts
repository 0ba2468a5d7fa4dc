import type { Ecosystem, EcosystemProfile } from '../types.js'

const profile = (p: EcosystemProfile): EcosystemProfile => Object.freeze({
  ...p,
  manifests: Object.freeze([...p.manifests]),
  lockFiles: Object.freeze([...p.lockFiles])
})

export const ECOSYSTEM_PROFILES: Readonly<Record<Ecosystem, EcosystemProfile>> = Object.freeze({
  npm: profile({
    id: 'npm',
    displayName: 'JavaScript/TypeScript',
    manifests: ['package.json'],
    lockFiles: ['package-lock.json', 'pnpm-lock.yaml', 'yarn.lock'],
    installRoot: 'node_modules',
    installCommand: 'npm install {package}',
    checkCommand: 'npm ls {package}',
    updateCommand: 'npm install {package}@{version}',
    batchInstall: true
  }),
  pip: profile({
    id: 'pip',
    displayName: 'Python',
    manifests: ['pyproject.toml', 'requirements.txt'],
    lockFiles: ['uv.lock', 'poetry.lock'],
    installRoot: '.venv/lib',
    installCommand: 'pip install {package}',
    checkCommand: 'pip show {package}',
    updateCommand: 'pip install --upgrade "{package}>={version}"',
    batchInstall: true
  }),
  go: profile({
    id: 'go',
    displayName: 'Go',
    manifests: ['go.mod'],
    lockFiles: ['go.sum'],
    installRoot: 'go.sum',
    installCommand: 'go get {package}',
    checkCommand: 'go list -m {package}',
    updateCommand: 'go get {package}@v{version}',
    batchInstall: false
  }),
  cargo: profile({
    id: 'cargo',
    displayName: 'Rust',
    manifests: ['Cargo.toml'],
    lockFiles: ['Cargo.lock'],
    installRoot: 'Cargo.lock',
    installCommand: 'cargo add {package}',
    checkCommand: 'cargo tree -p {package}',
    updateCommand: 'cargo update -p {package}',
    batchInstall: false
  }),
  gem: profile({
    id: 'gem',
    displayName: 'Ruby',
    manifests: ['Gemfile'],
    lockFiles: ['Gemfile.lock'],
    installRoot: 'Gemfile.lock',
    installCommand: 'gem install {package}',
    checkCommand: 'bundle info {package}',
    updateCommand: 'bundle update {package}',
    batchInstall: true
  }),
  composer: profile({
    id: 'composer',
    displayName: 'PHP',
    manifests: ['composer.json'],
    lockFiles: ['composer.lock'],
    installRoot: 'vendor',
    installCommand: 'composer require {package}',
    checkCommand: 'composer show {package}',
    updateCommand: 'composer update {package}',
    batchInstall: true
  })
})

export function isEcosystem(value: unknown): value is Ecosystem {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ECOSYSTEM_PROFILES, value)
}

export function getProfile(id: string): EcosystemProfile | undefined {
  return isEcosystem(id) ? ECOSYSTEM_PROFILES[id] : undefined
}

export function renderCommand(template: string, pkg: string, version = ''): string {
  return template.replaceAll('{package}', pkg).replaceAll('{version}', version)
}

export function watchedFiles(profiles: readonly EcosystemProfile[]): string[] {
  const out = new Set<string>()
  for (const p of profiles) {
    for (const f of [...p.manifests, ...p.lockFiles]) out.add(f)
  }
  return [...out]
}
