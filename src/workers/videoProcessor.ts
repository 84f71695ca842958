import fs from 'fs'
import type pino from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { AppConfig } from '../config'
import { getLogger, redactFilePath, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { messages } from '../messages'
import {
  fail,
  ok,
  type JobFailure,
  type JobFailureKind,
  type JobOutcome,
  type JobStage,
  type StageResult,
  type VideoJob,
  type VideoJobInput,
} from '../models/Job'
import { enforceDurationBound, normalizeSegments, type Segment } from '../models/Segment'
import type { Renderer } from '../services/ffmpeg'
import { writeSubtitleTrack } from '../services/subtitles'
import type { Transcriber } from '../services/transcription'
import { TARGET_LANGUAGE, translateBatch, type TextTranslator } from '../services/translation'
import type { Transport } from '../services/transport'
import { StageTimeoutError, errorMessage, withTimeout } from '../utils/errors'
import { safeVideoExtension } from '../utils/sanitizeFilename'
import { createTempPath, removeQuietly } from '../utils/tempFiles'

export type VideoProcessorConfig = Pick<AppConfig, 'maxVideoSeconds' | 'tempDir' | 'fontsDir' | 'stageTimeoutMs'>

export interface VideoProcessorDeps {
  transport: Transport
  transcriber: Transcriber
  translator: TextTranslator
  renderer: Renderer
  config: VideoProcessorConfig
  logger?: pino.Logger
  onStageChange?: (jobId: string, stage: JobStage) => void
  reportError?: (job: VideoJob, failure: JobFailure) => void
}

interface StepOptions {
  /** Apply the per-stage budget. Off for local work and for steps that budget each call. */
  timed?: boolean
}

/** Failures caused by the video itself are expected; everything else goes to error reporting. */
const EXPECTED_FAILURES: ReadonlySet<JobFailureKind> = new Set(['no-speech', 'too-long'])

function defaultReportError(job: VideoJob, failure: JobFailure): void {
  captureJobError(job.id, job.destinationId, failure.stage, failure.cause ?? new Error(failure.message))
}

/**
 * Runs one video through download → transcribe → validate → duration gate → translate →
 * serialize → render → deliver, then always cleans up. Stages are strictly sequential and
 * stop at the first failure; the user gets one notice per failed job.
 */
export class VideoProcessor {
  private readonly log: pino.Logger

  constructor(private readonly deps: VideoProcessorDeps) {
    this.log = deps.logger ?? getLogger('worker')
  }

  /**
   * Never throws: every error ends as a failed outcome after cleanup. A timed-out stage is
   * aborted and has settled before cleanup runs, so no stage work outlives the job.
   */
  async process(input: VideoJobInput): Promise<JobOutcome> {
    const job: VideoJob = {
      ...input,
      id: uuidv4(),
      stage: 'admitted',
      segments: [],
      artifacts: new Set(),
      createdAt: new Date(),
    }
    const log = withJobContext(job.id, job.destinationId, this.log)
    this.enter(job, 'admitted', log)

    try {
      let result: StageResult<number>
      try {
        result = await this.run(job, log)
      } catch (err) {
        result = fail(this.toFailure(job, 'processing', err))
      }

      if (result.ok) {
        log.info({ msg: 'Job delivered', segments: result.value, ms: Date.now() - job.createdAt.getTime() })
        return { status: 'delivered', segmentCount: result.value }
      }
      await this.handleFailure(job, result.failure, log)
      return { status: 'failed', failure: result.failure }
    } finally {
      await this.cleanup(job, log)
    }
  }

  private async run(job: VideoJob, log: pino.Logger): Promise<StageResult<number>> {
    const { transport, transcriber, translator, renderer, config } = this.deps

    await this.notifyProgress(job, messages.downloading, log)
    const inputPath = createTempPath(config.tempDir, 'input', safeVideoExtension(job.filenameHint))
    job.artifacts.add(inputPath)
    const downloaded = await this.step(job, 'transport', 'download', async (signal) => {
      const bytes = await job.download(signal)
      signal.throwIfAborted()
      await fs.promises.writeFile(inputPath, bytes, { signal })
      return bytes.length
    })
    if (!downloaded.ok) return fail(downloaded.failure)
    this.enter(job, 'downloaded', log, { bytes: downloaded.value })

    await this.notifyProgress(job, messages.transcribing, log)
    const transcribed = await this.step(job, 'processing', 'transcription', (signal) =>
      transcriber.transcribe(inputPath, signal)
    )
    if (!transcribed.ok) return fail(transcribed.failure)
    this.enter(job, 'transcribed', log, { spans: transcribed.value.length })

    const segments = normalizeSegments(transcribed.value)
    if (segments.length === 0) {
      return fail({ kind: 'no-speech', stage: job.stage, message: 'No usable speech segments' })
    }
    job.segments = segments
    this.enter(job, 'validated', log, {
      segments: segments.length,
      dropped: transcribed.value.length - segments.length,
    })

    const bound = enforceDurationBound(segments, config.maxVideoSeconds)
    if (!bound.ok) {
      return fail({
        kind: 'too-long',
        stage: job.stage,
        message: `Speech runs to ${bound.duration}s, limit is ${bound.maxSeconds}s`,
        duration: bound.duration,
      })
    }
    this.enter(job, 'duration-checked', log, { duration: bound.duration })

    await this.notifyProgress(job, messages.translating, log)
    const translated = await this.step(
      job,
      'processing',
      'translation',
      () =>
        translateBatch(
          segments.map((s) => s.text),
          TARGET_LANGUAGE,
          translator,
          { logger: log, wrapCall: (call, label) => withTimeout(call, config.stageTimeoutMs, label) }
        ),
      { timed: false }
    )
    if (!translated.ok) return fail(translated.failure)
    if (translated.value.length !== segments.length) {
      return fail({ kind: 'processing', stage: job.stage, message: 'Translation count does not match segments' })
    }
    applyTranslations(segments, translated.value)
    this.enter(job, 'translated', log)

    await this.notifyProgress(job, messages.serializing, log)
    const serialized = await this.step(
      job,
      'processing',
      'serialization',
      async () => {
        const assPath = await writeSubtitleTrack(segments, config.tempDir)
        job.artifacts.add(assPath)
        return assPath
      },
      { timed: false }
    )
    if (!serialized.ok) return fail(serialized.failure)
    const assPath = serialized.value
    this.enter(job, 'serialized', log, { subtitles: redactFilePath(assPath) })

    await this.notifyProgress(job, messages.burning, log)
    const outputPath = createTempPath(config.tempDir, 'output', '.mp4')
    job.artifacts.add(outputPath)
    const rendered = await this.step(job, 'processing', 'render', (signal) =>
      renderer.burnSubtitles(inputPath, assPath, outputPath, config.fontsDir, signal)
    )
    if (!rendered.ok) return fail(rendered.failure)
    this.enter(job, 'rendered', log)

    await this.notifyProgress(job, messages.uploading, log)
    const delivered = await this.step(job, 'transport', 'delivery', () =>
      transport.deliverVideo(job.destinationId, outputPath, messages.resultCaption)
    )
    if (!delivered.ok) return fail(delivered.failure)
    this.enter(job, 'delivered', log)

    return ok(segments.length)
  }

  private async step<T>(
    job: VideoJob,
    kind: JobFailureKind,
    label: string,
    fn: (signal: AbortSignal) => Promise<T>,
    options: StepOptions = {}
  ): Promise<StageResult<T>> {
    const budgetMs = (options.timed ?? true) ? this.deps.config.stageTimeoutMs : 0
    try {
      return ok(await withTimeout(fn, budgetMs, label))
    } catch (err) {
      return fail(this.toFailure(job, kind, err))
    }
  }

  private toFailure(job: VideoJob, kind: JobFailureKind, err: unknown): JobFailure {
    return {
      kind: err instanceof StageTimeoutError ? 'timeout' : kind,
      stage: job.stage,
      message: errorMessage(err),
      cause: err,
    }
  }

  private async handleFailure(job: VideoJob, failure: JobFailure, log: pino.Logger): Promise<void> {
    this.enter(job, 'failed', log, { kind: failure.kind, failedAfter: failure.stage })
    if (EXPECTED_FAILURES.has(failure.kind)) {
      log.info({ msg: 'Job rejected', kind: failure.kind, reason: failure.message })
    } else {
      log.error({ msg: 'Job failed', kind: failure.kind, failedAfter: failure.stage, error: failure.message })
      try {
        ;(this.deps.reportError ?? defaultReportError)(job, failure)
      } catch (err) {
        log.warn({ msg: 'Error reporting failed', error: errorMessage(err) })
      }
    }

    try {
      await this.deps.transport.notify(job.destinationId, this.failureNotice(failure))
    } catch (err) {
      log.warn({ msg: 'Failure notice not delivered', error: errorMessage(err) })
    }
  }

  private failureNotice(failure: JobFailure): string {
    switch (failure.kind) {
      case 'no-speech':
        return messages.noSpeech
      case 'too-long':
        return messages.tooLong(this.deps.config.maxVideoSeconds)
      default:
        return messages.processingError
    }
  }

  private async cleanup(job: VideoJob, log: pino.Logger): Promise<void> {
    for (const artifact of job.artifacts) {
      const removed = await removeQuietly(artifact)
      if (!removed) log.warn({ msg: 'Could not remove temp file', file: redactFilePath(artifact) })
    }
    job.artifacts.clear()
    job.segments = []
    this.enter(job, 'cleaned', log)
  }

  private async notifyProgress(job: VideoJob, text: string, log: pino.Logger): Promise<void> {
    try {
      await this.deps.transport.notify(job.destinationId, text)
    } catch (err) {
      log.warn({ msg: 'Progress notice not delivered', error: errorMessage(err) })
    }
  }

  private enter(job: VideoJob, stage: JobStage, log: pino.Logger, details: Record<string, unknown> = {}): void {
    job.stage = stage
    log.info({ msg: 'Job stage', stage, ...details })
    try {
      this.deps.onStageChange?.(job.id, stage)
    } catch (err) {
      log.warn({ msg: 'Stage listener failed', stage, error: errorMessage(err) })
    }
  }
}

/** Each segment's text is replaced exactly once, by the translation at the same index. */
function applyTranslations(segments: Segment[], translations: readonly string[]): void {
  segments.forEach((segment, i) => {
    segment.text = translations[i]
  })
}
