/**
 * Environment loader - import first, before anything reads process.env.
 *
 * Loads apps/matcher/.env.local in development. Production injects
 * variables directly.
 */
import { config } from 'dotenv'
import { resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(__dirname, '..', '.env.local')
  config({ path: envPath })
}
