import { Telegraf } from 'telegraf'
import { message } from 'telegraf/filters'
import type pino from 'pino'
import type { BotHandlers } from '../bot/handlers'
import type { DestinationId } from '../models/Job'
import { TransportError, errorMessage } from '../utils/errors'
import type { Transport } from './transport'

/** Bot API refuses getFile for anything larger. */
export const TELEGRAM_MAX_DOWNLOAD_BYTES = 20 * 1024 * 1024

const DOWNLOAD_TIMEOUT_MS = 120 * 1000

export function createTelegramBot(token: string): Telegraf {
  return new Telegraf(token)
}

export function createTelegramTransport(bot: Telegraf): Transport {
  return {
    async notify(destinationId: DestinationId, text: string) {
      await bot.telegram.sendMessage(destinationId, text)
    },
    async deliverVideo(destinationId: DestinationId, filePath: string, caption: string) {
      try {
        await bot.telegram.sendVideo(destinationId, { source: filePath }, { caption })
      } catch (err) {
        throw new TransportError(`Video upload failed: ${errorMessage(err)}`, err)
      }
    },
  }
}

/** Fetch a file's bytes through its Bot API download link. Aborts on its own timeout or the caller's signal. */
export async function fetchTelegramFile(bot: Telegraf, fileId: string, signal?: AbortSignal): Promise<Buffer> {
  const timeout = AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS)
  try {
    const link = await bot.telegram.getFileLink(fileId)
    const res = await fetch(link, { signal: signal ? AbortSignal.any([signal, timeout]) : timeout })
    if (!res.ok) {
      throw new Error(`download returned ${res.status}`)
    }
    return Buffer.from(await res.arrayBuffer())
  } catch (err) {
    throw new TransportError(`Video download failed: ${errorMessage(err)}`, err)
  }
}

/**
 * Route updates to the handlers. Handlers only decide admission, so each update returns
 * quickly and polling never waits on a job.
 */
export function registerBotHandlers(bot: Telegraf, handlers: BotHandlers, logger: pino.Logger): void {
  bot.start(async (ctx) => {
    await handlers.onStart(ctx.chat.id)
  })

  bot.on(message('video'), async (ctx) => {
    const { video } = ctx.message
    await handlers.onVideo({
      destinationId: ctx.chat.id,
      fileId: video.file_id,
      fileName: video.file_name,
      fileSize: video.file_size,
    })
  })

  // Videos sent "as file" arrive as documents
  bot.on(message('document'), async (ctx) => {
    const { document } = ctx.message
    if (!document.mime_type?.startsWith('video/')) return
    await handlers.onVideo({
      destinationId: ctx.chat.id,
      fileId: document.file_id,
      fileName: document.file_name,
      fileSize: document.file_size,
    })
  })

  bot.catch((err, ctx) => {
    logger.error({ msg: 'Bot update failed', updateType: ctx.updateType, error: errorMessage(err) })
  })
}
