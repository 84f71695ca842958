import fs from 'fs'
import os from 'os'
import path from 'path'
import { ConfigError } from './utils/errors'

export const DEFAULT_PROVIDER_BASE_URL = 'https://api.groq.com/openai/v1'
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-large-v3-turbo'
export const DEFAULT_TRANSLATION_MODEL = 'llama-3.3-70b-versatile'

export interface AppConfig {
  telegramToken: string
  providerApiKey: string
  providerBaseUrl: string
  transcriptionModel: string
  translationModel: string
  /** Longest speech span (max segment end, seconds) a job may carry. */
  maxVideoSeconds: number
  /** Admission capacity: jobs processed at once. */
  workers: number
  port: number
  fontsDir?: string
  tempDir: string
  /** Budget for each external call a job waits on; 0 disables. */
  stageTimeoutMs: number
}

type Env = Record<string, string | undefined>

function readString(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim()
    if (value) return value
  }
  return undefined
}

function readInt(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  problems: string[]
): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${key} must be an integer >= ${min} (got "${raw}")`)
    return fallback
  }
  return value
}

function resolveFontsDir(env: Env): string | undefined {
  const configured = readString(env, 'FONTS_DIR')
  if (configured) return path.resolve(configured)
  const local = path.resolve('fonts')
  return fs.existsSync(local) && fs.statSync(local).isDirectory() ? local : undefined
}

/**
 * Build the typed config from environment variables. Throws ConfigError naming every problem,
 * so a misconfigured deploy fails once with the full list.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = []

  const telegramToken = readString(env, 'TELEGRAM_TOKEN', 'BOT_TOKEN')
  if (!telegramToken) problems.push('TELEGRAM_TOKEN (or BOT_TOKEN) is not set')
  const providerApiKey = readString(env, 'GROQ_API_KEY')
  if (!providerApiKey) problems.push('GROQ_API_KEY is not set')

  const maxVideoSeconds = readInt(env, 'MAX_VIDEO_SECONDS', 300, 1, problems)
  const workers = readInt(env, 'WORKERS', 1, 1, problems)
  const port = readInt(env, 'PORT', 8080, 0, problems)
  const stageTimeoutSeconds = readInt(env, 'STAGE_TIMEOUT_SECONDS', 600, 0, problems)

  if (problems.length > 0 || !telegramToken || !providerApiKey) {
    throw new ConfigError(problems)
  }

  return {
    telegramToken,
    providerApiKey,
    providerBaseUrl: readString(env, 'PROVIDER_BASE_URL') ?? DEFAULT_PROVIDER_BASE_URL,
    transcriptionModel: readString(env, 'TRANSCRIPTION_MODEL') ?? DEFAULT_TRANSCRIPTION_MODEL,
    translationModel: readString(env, 'TRANSLATION_MODEL') ?? DEFAULT_TRANSLATION_MODEL,
    maxVideoSeconds,
    workers,
    port,
    fontsDir: resolveFontsDir(env),
    tempDir: readString(env, 'TEMP_FILE_PATH') ?? os.tmpdir(),
    stageTimeoutMs: stageTimeoutSeconds * 1000,
  }
}
