import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { hasErrorCode } from './errors'

/** Every artifact the bot writes starts with this, so the sweeper never touches foreign files. */
export const TEMP_FILE_PREFIX = 'subbot-'

export function createTempPath(dir: string, prefix: string, extension: string): string {
  return path.join(dir, `${TEMP_FILE_PREFIX}${prefix}-${uuidv4()}${extension}`)
}

export function isBotTempFile(fileName: string): boolean {
  return fileName.startsWith(TEMP_FILE_PREFIX)
}

/**
 * Delete a file; a missing file is not an error. Returns false when removal failed
 * for another reason so the caller can log it.
 */
export async function removeQuietly(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath)
    return true
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return true
    return false
  }
}
