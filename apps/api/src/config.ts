import { isEcosystem, type Ecosystem } from '@dephealth/core'

export interface ApiConfig {
  port: number
  host: string
  root?: string
  ttlMs?: number
  skip: Ecosystem[]
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = Number(env.PORT)
  const ttl = Number(env.DEPHEALTH_TTL_SECONDS)
  return {
    port: env.PORT && Number.isInteger(port) && port >= 0 ? port : 3333,
    host: env.HOST || '0.0.0.0',
    root: env.DEPHEALTH_ROOT || undefined,
    ttlMs: env.DEPHEALTH_TTL_SECONDS && Number.isFinite(ttl) && ttl >= 0 ? ttl * 1000 : undefined,
    skip: (env.DEPHEALTH_SKIP ?? '').split(',').map(s => s.trim()).filter(isEcosystem)
  }
}
