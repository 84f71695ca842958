import path from 'path'

const SAFE_EXTENSION_REGEX = /^\.[a-z0-9]{1,5}$/

/**
 * Extension to use for the downloaded input, taken from the sender's filename hint.
 * The hint is user-controlled: only a short alphanumeric extension survives, else the fallback.
 */
export function safeVideoExtension(filenameHint: string | undefined, fallback = '.mp4'): string {
  if (!filenameHint) return fallback
  const base = path.basename(filenameHint.replace(/\0/g, '').replace(/\\/g, '/'))
  const ext = path.extname(base).toLowerCase()
  return SAFE_EXTENSION_REGEX.test(ext) ? ext : fallback
}
