/**
 * Load .env before config is read. Must be the first import in index.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'
import dotenv from 'dotenv'

// Fall back to a .env next to the compiled output when the bot is started from another cwd
const distEnv = path.join(__dirname, '..', '..', '.env')
if (!process.env.TELEGRAM_TOKEN && !process.env.BOT_TOKEN && fs.existsSync(distEnv)) {
  dotenv.config({ path: distEnv, override: false })
}
