/**
 * Structured JSON logger for the bot control path, the job workers and the ops HTTP surface.
 * Single format: level, timestamp, service, env, release, plus jobId/destinationId for job context.
 * Redacts credentials. LOG_LEVEL=silent is handy in tests.
 */
import path from 'path'
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'info'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'token',
  'apiKey',
  'api_key',
  'authorization',
  'config.telegramToken',
  'config.providerApiKey',
  'TELEGRAM_TOKEN',
  'BOT_TOKEN',
  'GROQ_API_KEY',
  'SENTRY_DSN',
]

export type ServiceName = 'bot' | 'worker' | 'api'

// Shared by every service logger; only the `service` binding differs
const sharedOptions: pino.LoggerOptions = {
  level,
  redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  serializers: { err: pino.stdSerializers.err },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = pino({ ...sharedOptions, base: { service, env, release } })
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger for one job: every line carries jobId and the chat it reports to. */
export function withJobContext(
  jobId: string,
  destinationId: string | number,
  parent: pino.Logger = getLogger('worker')
): pino.Logger {
  return parent.child({ jobId, destinationId: String(destinationId) })
}

/** Temp and upload paths are logged by file name only. */
export function redactFilePath(filePath: string): string {
  return path.posix.basename(filePath.replace(/\\/g, '/')) || '[REDACTED]'
}
