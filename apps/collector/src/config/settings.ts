/**
 * Collector settings, read once from the environment.
 *
 * Numeric values are parsed strictly and clamped to sane ranges; a bad
 * value falls back to its default rather than aborting, except for
 * choices with no safe default (WATERMARK_BACKEND).
 */

import { ConfigError } from '../collection/errors.js'
import {
  DEFAULT_POLITENESS,
  DEFAULT_RETRY_POLICY,
  type PolitenessConfig,
  type RetryPolicy,
} from '../collection/types.js'

export type WatermarkBackend = 'file' | 'redis'

export interface RedisSettings {
  url?: string
  host: string
  port: number
  password?: string
  watermarkKey: string
}

export interface CollectorSettings {
  rawDataDir: string
  stateDir: string
  watermarkBackend: WatermarkBackend
  redis: RedisSettings
  http: {
    timeoutMs: number
    maxResponseBytes: number
    userAgent?: string
  }
  retry: RetryPolicy
  politeness: PolitenessConfig
  /** 0 disables the run deadline */
  runDeadlineMs: number
  costLimitBytes: number
  fred: { apiKey?: string }
  bigquery: { projectId?: string; accessToken?: string }
}

type Env = Record<string, string | undefined>

const GIB = 1024 * 1024 * 1024

function parseIntOr(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value.trim() === '') return fallback
  if (!/^\d+$/.test(value.trim())) return fallback
  const parsed = Number.parseInt(value.trim(), 10)
  return Math.min(max, Math.max(min, parsed))
}

function parseFloatOr(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value.trim())
  if (!Number.isFinite(parsed)) return fallback
  return Math.min(max, Math.max(min, parsed))
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return fallback
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function isWatermarkBackend(value: string): value is WatermarkBackend {
  return value === 'file' || value === 'redis'
}

export function loadSettings(env: Env = process.env): CollectorSettings {
  const backend = (nonEmpty(env.WATERMARK_BACKEND) ?? 'file').toLowerCase()
  if (!isWatermarkBackend(backend)) {
    throw new ConfigError(`WATERMARK_BACKEND must be 'file' or 'redis', got '${backend}'`)
  }

  const jitterMax = parseIntOr(env.POLITENESS_JITTER_MS, DEFAULT_POLITENESS.jitter.maxMs, 0, 60000)

  return {
    rawDataDir: nonEmpty(env.RAW_DATA_DIR) ?? 'data/raw',
    stateDir: nonEmpty(env.STATE_DIR) ?? 'data/state',
    watermarkBackend: backend,
    redis: {
      url: nonEmpty(env.REDIS_URL),
      host: nonEmpty(env.REDIS_HOST) ?? 'localhost',
      port: parseIntOr(env.REDIS_PORT, 6379, 1, 65535),
      password: nonEmpty(env.REDIS_PASSWORD),
      watermarkKey: nonEmpty(env.REDIS_WATERMARK_KEY) ?? 'collector:watermarks',
    },
    http: {
      timeoutMs: parseIntOr(env.HTTP_TIMEOUT_MS, 30000, 1000, 600000),
      maxResponseBytes: parseIntOr(env.HTTP_MAX_RESPONSE_BYTES, 50 * 1024 * 1024, 1024, 1024 * 1024 * 1024),
      userAgent: nonEmpty(env.HTTP_USER_AGENT),
    },
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: parseIntOr(env.RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts, 1, 20),
      baseDelayMs: parseIntOr(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs, 0, 600000),
      backoffMultiplier: parseFloatOr(env.RETRY_MULTIPLIER, DEFAULT_RETRY_POLICY.backoffMultiplier, 1, 10),
      maxDelayMs: parseIntOr(env.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs, 0, 3600000),
      maxRetryAfterMs: parseIntOr(env.RETRY_AFTER_MAX_MS, DEFAULT_RETRY_POLICY.maxRetryAfterMs, 0, 3600000),
      honorRetryAfter: parseBool(env.RETRY_HONOR_RETRY_AFTER, DEFAULT_RETRY_POLICY.honorRetryAfter),
    },
    politeness: {
      minIntervalMs: parseIntOr(env.POLITENESS_MIN_INTERVAL_MS, DEFAULT_POLITENESS.minIntervalMs, 0, 600000),
      jitter: { minMs: 0, maxMs: jitterMax },
    },
    runDeadlineMs: parseIntOr(env.RUN_DEADLINE_MS, 0, 0, 24 * 60 * 60 * 1000),
    costLimitBytes: parseIntOr(env.COST_LIMIT_BYTES, 5 * GIB, 0, Number.MAX_SAFE_INTEGER),
    fred: { apiKey: nonEmpty(env.FRED_API_KEY) },
    bigquery: {
      projectId: nonEmpty(env.BIGQUERY_PROJECT_ID),
      accessToken: nonEmpty(env.BIGQUERY_ACCESS_TOKEN),
    },
  }
}
