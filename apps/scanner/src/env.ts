/**
 * Environment loader - must be imported first before any other modules
 *
 * This uses an explicit path to load from apps/scanner/.env.local
 * Only loads in development - production uses platform-injected env vars
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(__dirname, '..', '.env.local')
  config({ path: envPath })
}
