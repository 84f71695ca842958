import type pino from 'pino'
import { getLogger } from '../lib/logger'
import { messages } from '../messages'
import type { DestinationId, VideoJobInput } from '../models/Job'
import type { Transport } from '../services/transport'
import { errorMessage } from '../utils/errors'

/** A video message as the chat platform announced it; the bytes are not fetched yet. */
export interface IncomingVideo {
  destinationId: DestinationId
  fileId: string
  fileName?: string
  fileSize?: number
}

export type VideoAdmission = 'accepted' | 'busy' | 'too-large'

export interface BotHandlerDeps {
  pool: { trySubmit(job: VideoJobInput): boolean }
  transport: Transport
  fetchFile: (fileId: string, signal?: AbortSignal) => Promise<Buffer>
  maxVideoSeconds: number
  maxDownloadBytes: number
  logger?: pino.Logger
}

export interface BotHandlers {
  onStart(destinationId: DestinationId): Promise<void>
  onVideo(video: IncomingVideo): Promise<VideoAdmission>
}

/**
 * Control-path handlers. Admission is decided synchronously; no pipeline work runs here,
 * so a full pool answers "busy" immediately instead of queueing.
 */
export function createBotHandlers(deps: BotHandlerDeps): BotHandlers {
  const log = deps.logger ?? getLogger('bot')

  const reply = async (destinationId: DestinationId, text: string) => {
    try {
      await deps.transport.notify(destinationId, text)
    } catch (err) {
      log.warn({ msg: 'Reply not delivered', destinationId: String(destinationId), error: errorMessage(err) })
    }
  }

  return {
    async onStart(destinationId) {
      await reply(destinationId, messages.welcome(deps.maxVideoSeconds))
    },

    async onVideo(video) {
      if (video.fileSize !== undefined && video.fileSize > deps.maxDownloadBytes) {
        log.info({ msg: 'Video rejected: too large', destinationId: String(video.destinationId), bytes: video.fileSize })
        await reply(video.destinationId, messages.fileTooLarge(Math.floor(deps.maxDownloadBytes / (1024 * 1024))))
        return 'too-large'
      }

      const accepted = deps.pool.trySubmit({
        destinationId: video.destinationId,
        filenameHint: video.fileName,
        download: (signal) => deps.fetchFile(video.fileId, signal),
      })
      if (!accepted) {
        log.info({ msg: 'Video rejected: busy', destinationId: String(video.destinationId) })
        await reply(video.destinationId, messages.busy)
        return 'busy'
      }

      log.info({ msg: 'Video accepted', destinationId: String(video.destinationId) })
      return 'accepted'
    },
  }
}
