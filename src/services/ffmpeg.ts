import ffmpeg from 'fluent-ffmpeg'
import fs from 'fs'
import path from 'path'
import type pino from 'pino'
import { getLogger, redactFilePath } from '../lib/logger'
import { RenderError } from '../utils/errors'

/**
 * Burns a subtitle track into a video. Rejects on any failure; there is no retry at this layer.
 * Once signal aborts, the encoder is killed and the promise rejects.
 */
export interface Renderer {
  burnSubtitles(
    inputPath: string,
    subtitlePath: string,
    outputPath: string,
    fontsDir?: string,
    signal?: AbortSignal
  ): Promise<void>
}

/** Kill ffmpeg if it reports no progress for this long. */
export const HUNG_JOB_MS = 90 * 1000
export const HUNG_JOB_MESSAGE = 'HUNG_JOB'
export const CANCELLED_MESSAGE = 'ffmpeg cancelled'

/** libx264, fast preset, fixed quality; audio is copied untouched. */
export const BURN_OUTPUT_OPTIONS = ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '23', '-c:a', 'copy']

// Explicit path from env (e.g. a static build) if the file exists, else ffmpeg from PATH.
// Read on every burn so a changed FFMPEG_PATH takes effect.
function applyFfmpegPath(): void {
  const envPath = process.env.FFMPEG_PATH
  if (envPath && fs.existsSync(envPath)) ffmpeg.setFfmpegPath(envPath)
}

/** Quote a value for the filtergraph: single quotes, with embedded quotes closed and escaped. */
function quoteFilterValue(value: string): string {
  // Forward slashes and an escaped drive-letter colon keep Windows paths parseable
  const normalized = path.resolve(value).replace(/\\/g, '/').replace(/^([A-Za-z]):/, '$1\\:')
  return `'${normalized.replace(/'/g, `'\\''`)}'`
}

/** The ass video filter, pointed at fontsDir when one is configured. */
export function buildSubtitleFilter(subtitlePath: string, fontsDir?: string): string {
  const filter = `ass=${quoteFilterValue(subtitlePath)}`
  return fontsDir ? `${filter}:fontsdir=${quoteFilterValue(fontsDir)}` : filter
}

function setupHungProtection(
  cmd: { kill: (signal: string) => unknown },
  idleMs: number,
  onHung: () => void
): { clear: () => void; reset: () => void } {
  let hungTimer: NodeJS.Timeout | undefined
  const reset = () => {
    clearTimeout(hungTimer)
    hungTimer = setTimeout(() => {
      try {
        cmd.kill('SIGKILL')
      } finally {
        onHung()
      }
    }, idleMs)
  }
  const clear = () => clearTimeout(hungTimer)
  reset()
  return { clear, reset }
}

export interface BurnOptions {
  fontsDir?: string
  idleTimeoutMs?: number
  logger?: pino.Logger
  signal?: AbortSignal
}

/**
 * Re-encode inputPath with the ASS track burned in, writing outputPath.
 * Non-zero exit, a hung process or an empty output file all reject with RenderError.
 */
export function burnSubtitles(
  inputPath: string,
  subtitlePath: string,
  outputPath: string,
  options: BurnOptions = {}
): Promise<void> {
  const log = options.logger ?? getLogger('worker')
  const { signal } = options
  if (signal?.aborted) return Promise.reject(new RenderError(CANCELLED_MESSAGE))
  applyFfmpegPath()

  return new Promise((resolve, reject) => {
    let settled = false
    const finish = () => {
      settled = true
      hung.clear()
      signal?.removeEventListener('abort', onAbort)
    }
    const fail = (err: RenderError) => {
      if (settled) return
      finish()
      reject(err)
    }

    const filter = buildSubtitleFilter(subtitlePath, options.fontsDir)
    log.info({
      msg: 'Burning subtitles',
      input: redactFilePath(inputPath),
      subtitles: redactFilePath(subtitlePath),
      output: redactFilePath(outputPath),
      fontsDir: options.fontsDir,
    })

    const cmd = ffmpeg(inputPath)
      .inputOptions(['-nostdin'])
      .videoFilters(filter)
      .outputOptions(BURN_OUTPUT_OPTIONS)
      .on('start', () => {
        // Spawned after a kill already gave up on it (kill is a no-op before spawn)
        if (settled) cmd.kill('SIGKILL')
      })
      .on('progress', () => {
        hung.reset()
      })
      .on('end', () => {
        if (settled) return
        fs.promises
          .stat(outputPath)
          .then((stats) => {
            if (stats.size === 0) {
              fail(new RenderError('ffmpeg finished but the output file is empty'))
              return
            }
            finish()
            log.info({ msg: 'Subtitle burning completed', output: redactFilePath(outputPath), bytes: stats.size })
            resolve()
          })
          .catch(() => fail(new RenderError('ffmpeg finished but wrote no output file')))
      })
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        log.error({ msg: 'FFmpeg error', error: err.message })
        fail(new RenderError(`FFmpeg error: ${err.message}`, stderr ?? undefined))
      })
      .on('stderr', (stderrLine: string) => {
        if (/error/i.test(stderrLine)) log.warn({ msg: 'FFmpeg stderr', line: stderrLine })
      })

    const hung = setupHungProtection(cmd, options.idleTimeoutMs ?? HUNG_JOB_MS, () =>
      fail(new RenderError(HUNG_JOB_MESSAGE))
    )
    const onAbort = () => {
      try {
        cmd.kill('SIGKILL')
      } finally {
        fail(new RenderError(CANCELLED_MESSAGE))
      }
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    cmd.save(outputPath)
  })
}

export function createFfmpegRenderer(options: Omit<BurnOptions, 'fontsDir' | 'signal'> = {}): Renderer {
  return {
    burnSubtitles: (inputPath, subtitlePath, outputPath, fontsDir, signal) =>
      burnSubtitles(inputPath, subtitlePath, outputPath, { ...options, fontsDir, signal }),
  }
}
