import fs from 'fs'
import path from 'path'
import type pino from 'pino'
import { hasErrorCode } from './errors'
import { isBotTempFile } from './tempFiles'

const CLEANUP_INTERVAL = 60 * 60 * 1000 // 1 hour
const FILE_MAX_AGE = 60 * 60 * 1000 // 1 hour

/**
 * Jobs remove their own artifacts; this sweep only catches what a crashed process left behind.
 * Returns the number of files deleted.
 */
export async function cleanupStaleFiles(
  tempDir: string,
  logger: pino.Logger,
  now: number = Date.now(),
  maxAgeMs: number = FILE_MAX_AGE
): Promise<number> {
  let files: string[]
  try {
    files = await fs.promises.readdir(tempDir)
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return 0
    throw err
  }

  let deletedCount = 0
  for (const file of files.filter(isBotTempFile)) {
    const filePath = path.join(tempDir, file)
    try {
      const stats = await fs.promises.lstat(filePath)
      if (!stats.isFile()) continue
      if (now - stats.mtimeMs > maxAgeMs) {
        await fs.promises.unlink(filePath)
        deletedCount++
      }
    } catch (error) {
      logger.warn({ msg: 'Stale file cleanup failed', file, error: String(error) })
    }
  }

  if (deletedCount > 0) {
    logger.info({ msg: 'Stale file cleanup', deleted: deletedCount })
  }
  return deletedCount
}

export function startFileCleanup(tempDir: string, logger: pino.Logger): NodeJS.Timeout {
  const run = () => {
    cleanupStaleFiles(tempDir, logger).catch((err) =>
      logger.error({ msg: 'Stale file cleanup crashed', error: String(err) })
    )
  }
  run()
  const timer = setInterval(run, CLEANUP_INTERVAL)
  timer.unref()
  return timer
}
