import './env'
import express from 'express'
import { initSentry, setupSentryErrorHandler } from './lib/sentry'

initSentry()
import { createBotHandlers } from './bot/handlers'
import { loadConfig, type AppConfig } from './config'
import { getLogger } from './lib/logger'
import type { VideoJobInput } from './models/Job'
import { createHealthRouter } from './routes/health'
import { createFfmpegRenderer } from './services/ffmpeg'
import {
  TELEGRAM_MAX_DOWNLOAD_BYTES,
  createTelegramBot,
  createTelegramTransport,
  fetchTelegramFile,
  registerBotHandlers,
} from './services/telegram'
import { createWhisperTranscriber } from './services/transcription'
import { createOpenAiTranslator } from './services/translation'
import { errorMessage } from './utils/errors'
import { startFileCleanup } from './utils/fileCleanup'
import { WorkerPool } from './workers/admission'
import { VideoProcessor } from './workers/videoProcessor'

const log = getLogger('api')

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig()
  } catch (err) {
    log.fatal({ msg: 'Configuration error', error: errorMessage(err) })
    process.exit(1)
  }
}

const config = loadConfigOrExit()

const bot = createTelegramBot(config.telegramToken)
const transport = createTelegramTransport(bot)

const processor = new VideoProcessor({
  transport,
  transcriber: createWhisperTranscriber({
    apiKey: config.providerApiKey,
    baseURL: config.providerBaseUrl,
    model: config.transcriptionModel,
  }),
  translator: createOpenAiTranslator({
    apiKey: config.providerApiKey,
    baseURL: config.providerBaseUrl,
    model: config.translationModel,
  }),
  renderer: createFfmpegRenderer(),
  config,
})

const pool = new WorkerPool<VideoJobInput>(config.workers, (job) => processor.process(job))

registerBotHandlers(
  bot,
  createBotHandlers({
    pool,
    transport,
    fetchFile: (fileId, signal) => fetchTelegramFile(bot, fileId, signal),
    maxVideoSeconds: config.maxVideoSeconds,
    maxDownloadBytes: TELEGRAM_MAX_DOWNLOAD_BYTES,
  }),
  getLogger('bot')
)

const app = express()
app.disable('x-powered-by')
app.use(createHealthRouter(pool))
setupSentryErrorHandler(app)

const server = app.listen(config.port, () => {
  log.info({
    msg: 'Server listening',
    port: config.port,
    workers: config.workers,
    maxVideoSeconds: config.maxVideoSeconds,
    fontsDir: config.fontsDir ?? null,
  })
  startFileCleanup(config.tempDir, log)
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ msg: `Port ${config.port} is already in use` })
  } else {
    log.fatal({ msg: 'Server error', error: error.message })
  }
  process.exit(1)
})

getLogger('bot').info({ msg: 'Starting bot polling' })
bot.launch().catch((err: unknown) => {
  getLogger('bot').fatal({ msg: 'Bot polling stopped', error: errorMessage(err) })
  process.exit(1)
})

let shuttingDown = false

// Stop taking videos, let in-flight jobs finish their cleanup, then close the HTTP server
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  log.info({ msg: `${signal} received, shutting down gracefully`, inFlight: pool.inFlight })
  bot.stop(signal)
  await pool.close()
  server.close(() => {
    log.info({ msg: 'Server closed' })
    process.exit(0)
  })
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => {
    log.error({ msg: 'Shutdown failed', error: errorMessage(err) })
    process.exit(1)
  })
})

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => {
    log.error({ msg: 'Shutdown failed', error: errorMessage(err) })
    process.exit(1)
  })
})
