import { pino } from 'pino'
import type { BaseLogger } from 'pino'

// Anything pino-shaped, including a Fastify request or app logger.
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>

export function createLogger(level = process.env.DEPHEALTH_LOG_LEVEL ?? 'warn'): Logger {
  return pino({ name: 'dephealth', level })
}

export const silentLogger: Logger = pino({ level: 'silent' })
