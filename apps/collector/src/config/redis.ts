import { Redis, type RedisOptions } from 'ioredis'
import { loggers } from './logger.js'
import type { RedisSettings } from './settings.js'

const log = loggers.redis

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

function describeConnection(settings: RedisSettings): string {
  return settings.url ? settings.url.replace(/\/\/([^@]*:)?[^@]+@/, '//***@') : `${settings.host}:${settings.port}`
}

export function buildRedisOptions(settings: RedisSettings): RedisOptions {
  const connection = describeConnection(settings)

  const baseOptions: RedisOptions = {
    maxRetriesPerRequest: 3,
    // Keepalive to prevent idle connection drops (ECONNRESET)
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,
    lazyConnect: false,
    retryStrategy(times: number) {
      consecutiveFailures = times

      // Circuit breaker: after 20 attempts, reduce logging frequency
      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times, connection })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
    reconnectOnError(err: Error) {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH']
      if (targetErrors.some(e => err.message.includes(e))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { error: err.message })
        }
        return true
      }
      return false
    },
  }

  return settings.url ? baseOptions : { ...baseOptions, host: settings.host, port: settings.port, password: settings.password }
}

export function createRedisClient(settings: RedisSettings): Redis {
  const options = buildRedisOptions(settings)
  const client = settings.url ? new Redis(settings.url, options) : new Redis(options)
  client.on('error', (err: Error) => {
    log.error('Redis error', { error: err.message })
  })
  return client
}
