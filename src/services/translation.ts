import OpenAI from 'openai'
import type pino from 'pino'
import { errorMessage } from '../utils/errors'

/** Subtitles are always rendered in Hebrew; there is no per-job language choice. */
export const TARGET_LANGUAGE = 'Hebrew'

/** Sentinel placed on its own line between texts of a batch. Never occurs in speech text. */
export const BATCH_SENTINEL = '<<<SPLIT>>>'
export const BATCH_DELIMITER = `\n${BATCH_SENTINEL}\n`

// Providers add or drop whitespace around the sentinel; split on the token itself.
const BATCH_SPLIT_REGEX = /\s*<<<SPLIT>>>\s*/

/** Stateless text translation provider. */
export interface TextTranslator {
  translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string>
}

export interface TranslateBatchOptions {
  logger?: pino.Logger
  /** Runs each provider call, e.g. under a timeout budget that aborts it through the signal. */
  wrapCall?: <T>(call: (signal?: AbortSignal) => Promise<T>, label: string) => Promise<T>
}

const passThrough = <T>(call: (signal?: AbortSignal) => Promise<T>) => call()

/**
 * Translate texts in one provider round-trip, keeping order and length.
 * The joined result is split back on the sentinel; if the part count does not match
 * (or the batch call itself fails) every text is translated on its own, in order.
 * Errors from the per-item fallback propagate.
 */
export async function translateBatch(
  texts: readonly string[],
  targetLanguage: string,
  translator: TextTranslator,
  options: TranslateBatchOptions = {}
): Promise<string[]> {
  if (texts.length === 0) return []
  const wrap = options.wrapCall ?? passThrough

  try {
    const joined = texts.join(BATCH_DELIMITER)
    const out = await wrap((signal) => translator.translate(joined, targetLanguage, signal), 'translate batch')
    const parts = out.split(BATCH_SPLIT_REGEX).map((p) => p.trim())
    if (parts.length === texts.length) return parts
    options.logger?.warn(
      { msg: 'Batch translation misaligned, translating per line', expected: texts.length, received: parts.length }
    )
  } catch (err) {
    options.logger?.warn({ msg: 'Batch translation failed, translating per line', error: errorMessage(err) })
  }

  const translated: string[] = []
  for (const [i, text] of texts.entries()) {
    const out = await wrap((signal) => translator.translate(text, targetLanguage, signal), `translate line ${i + 1}`)
    translated.push(out.trim())
  }
  return translated
}

export interface OpenAiTranslatorOptions {
  apiKey: string
  baseURL: string
  model: string
}

/** Strip the wrappers chat models like to add around a bare translation. */
export function cleanTranslationOutput(content: string): string {
  return content
    .replace(/^```[a-z]*\n?/i, '')
    .replace(/\n?```$/, '')
    .replace(/^Translation:?\s*/i, '')
    .trim()
}

/**
 * Translation over an OpenAI-compatible chat completions endpoint (Groq by default).
 */
export function createOpenAiTranslator(options: OpenAiTranslatorOptions): TextTranslator {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL })

  return {
    async translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string> {
      const response = await openai.chat.completions.create(
        {
          model: options.model,
          temperature: 0,
          messages: [
            {
              role: 'system',
              content: [
                `You translate video subtitles into ${targetLanguage}.`,
                `Lines that contain only ${BATCH_SENTINEL} are separators: copy them unchanged, in the same places.`,
                'Return only the translation. No notes, no quotes, no explanations.',
              ].join(' '),
            },
            { role: 'user', content: text },
          ],
        },
        { signal }
      )
      const content = response.choices[0]?.message?.content
      if (!content || !content.trim()) {
        throw new Error('Translation provider returned an empty response')
      }
      return cleanTranslationOutput(content)
    },
  }
}
