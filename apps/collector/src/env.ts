/**
 * Environment loader - import before anything that reads process.env
 *
 * Loads apps/collector/.env.local, then apps/collector/.env.
 * Production injects variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'

if (process.env.NODE_ENV !== 'production') {
  const appDir = resolve(dirname(fileURLToPath(import.meta.url)), '..')
  config({ path: resolve(appDir, '.env.local') })
  config({ path: resolve(appDir, '.env') })
}
