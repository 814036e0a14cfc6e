/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/collector/.env.local in development.
 * Production injects env vars directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
