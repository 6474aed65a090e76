import dotenv from 'dotenv'
import { isLogLevel, type LogLevel } from '@shared/logger'
import {
  DEFAULT_DIFF_CONCURRENCY,
  DEFAULT_GRAPH_LIMIT,
  DEFAULT_TICK_MS
} from './node/shared/constants'
import { ConfigError } from './node/shared/errors'

export type Configuration = {
  repoPath: string
  jjBinary: string
  graphLimit: number
  diffConcurrency: number
  tickMs: number
  logLevel: LogLevel
  logFile: string | null
}

type Env = Record<string, string | undefined>

/**
 * Reads `.env` into `process.env`. Separate from {@link loadConfiguration}
 * so tests can pass their own environment.
 */
export function loadDotenv(): void {
  dotenv.config()
}

export function loadConfiguration(
  env: Env = process.env,
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Configuration {
  const positional = argv.find((arg) => !arg.startsWith('-'))
  const repoPath = positional || env.TREELINE_REPO_PATH || cwd

  const logLevel = env.TREELINE_LOG_LEVEL || 'info'
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Unknown log level: ${logLevel}`, 'TREELINE_LOG_LEVEL')
  }

  return {
    repoPath,
    jjBinary: env.TREELINE_JJ_BIN || 'jj',
    graphLimit: readPositiveInt(env, 'TREELINE_GRAPH_LIMIT', DEFAULT_GRAPH_LIMIT),
    diffConcurrency: readPositiveInt(env, 'TREELINE_DIFF_CONCURRENCY', DEFAULT_DIFF_CONCURRENCY),
    tickMs: readPositiveInt(env, 'TREELINE_TICK_MS', DEFAULT_TICK_MS),
    logLevel,
    logFile: env.TREELINE_LOG_FILE || null
  }
}

function readPositiveInt(env: Env, field: string, fallback: number): number {
  const raw = env[field]
  if (raw === undefined || raw === '') return fallback

  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive integer, got "${raw}"`, field)
  }
  return value
}
