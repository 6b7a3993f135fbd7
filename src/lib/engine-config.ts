// Engine configuration and console logging
// Read once from the environment; tests call resetEngineConfig() between cases

import { z } from 'zod'
import { TwinValidationError } from './errors'

const LOG_LEVELS = ['silent', 'warn', 'debug'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const engineConfigSchema = z.object({
  TWIN_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
})

export interface EngineConfig {
  logLevel: LogLevel
}

let cached: EngineConfig | null = null

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const result = engineConfigSchema.safeParse({
    TWIN_LOG_LEVEL: env.TWIN_LOG_LEVEL || undefined,
  })
  if (!result.success) {
    throw TwinValidationError.fromZod('Invalid engine configuration', result.error)
  }
  return {
    logLevel: result.data.TWIN_LOG_LEVEL,
  }
}

export function getEngineConfig(): EngineConfig {
  if (!cached) {
    cached = loadEngineConfig()
  }
  return cached
}

export function resetEngineConfig(): void {
  cached = null
}

export const engineLog = {
  warn(message: string, ...details: unknown[]): void {
    if (getEngineConfig().logLevel === 'silent') return
    console.warn(`[twin] ${message}`, ...details)
  },
  debug(message: string, ...details: unknown[]): void {
    if (getEngineConfig().logLevel !== 'debug') return
    console.debug(`[twin] ${message}`, ...details)
  },
}
