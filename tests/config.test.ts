import assert from 'node:assert/strict'
import os from 'node:os'
import path from 'node:path'
import test from 'node:test'
import {
  DEFAULT_PROVIDER_BASE_URL,
  DEFAULT_TRANSCRIPTION_MODEL,
  DEFAULT_TRANSLATION_MODEL,
  loadConfig,
} from '../src/config'
import { ConfigError } from '../src/utils/errors'

const required = { TELEGRAM_TOKEN: 'test-telegram-token', GROQ_API_KEY: 'test-secret' }

test('loadConfig applies defaults', () => {
  const config = loadConfig({ ...required })
  assert.equal(config.telegramToken, 'test-telegram-token')
  assert.equal(config.providerApiKey, 'test-secret')
  assert.equal(config.providerBaseUrl, DEFAULT_PROVIDER_BASE_URL)
  assert.equal(config.transcriptionModel, DEFAULT_TRANSCRIPTION_MODEL)
  assert.equal(config.translationModel, DEFAULT_TRANSLATION_MODEL)
  assert.equal(config.maxVideoSeconds, 300)
  assert.equal(config.workers, 1)
  assert.equal(config.port, 8080)
  assert.equal(config.tempDir, os.tmpdir())
  assert.equal(config.stageTimeoutMs, 600_000)
})

test('loadConfig reads overrides and accepts BOT_TOKEN', () => {
  const config = loadConfig({
    BOT_TOKEN: 'test-bot-token',
    GROQ_API_KEY: 'test-secret',
    MAX_VIDEO_SECONDS: '120',
    WORKERS: '3',
    PORT: '3001',
    FONTS_DIR: 'assets/fonts',
    TEMP_FILE_PATH: '/var/tmp/subbot',
    STAGE_TIMEOUT_SECONDS: '0',
    TRANSLATION_MODEL: 'test-model',
  })
  assert.equal(config.telegramToken, 'test-bot-token')
  assert.equal(config.maxVideoSeconds, 120)
  assert.equal(config.workers, 3)
  assert.equal(config.port, 3001)
  assert.equal(config.fontsDir, path.resolve('assets/fonts'))
  assert.equal(config.tempDir, '/var/tmp/subbot')
  assert.equal(config.stageTimeoutMs, 0)
  assert.equal(config.translationModel, 'test-model')
})

test('loadConfig lists every problem in one ConfigError', () => {
  assert.throws(
    () => loadConfig({ WORKERS: '0', MAX_VIDEO_SECONDS: 'five minutes' }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError)
      assert.deepEqual(err.problems, [
        'TELEGRAM_TOKEN (or BOT_TOKEN) is not set',
        'GROQ_API_KEY is not set',
        'MAX_VIDEO_SECONDS must be an integer >= 1 (got "five minutes")',
        'WORKERS must be an integer >= 1 (got "0")',
      ])
      return true
    }
  )
})

test('blank credentials count as missing', () => {
  assert.throws(() => loadConfig({ TELEGRAM_TOKEN: '  ', GROQ_API_KEY: 'test-secret' }), ConfigError)
})
