/**
 * Environment loader - import first, before any module that reads process.env
 *
 * Loads apps/crawler/.env.local in development only.
 * Production injects env vars directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
