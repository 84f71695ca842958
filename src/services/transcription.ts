import OpenAI from 'openai'
import fs from 'fs'
import type { RawSpan } from '../models/Segment'

/** Speech-to-text provider: one blocking call, segments in the order spoken. */
export interface Transcriber {
  transcribe(audioFilePath: string, signal?: AbortSignal): Promise<RawSpan[]>
}

export interface WhisperTranscriberOptions {
  apiKey: string
  baseURL: string
  model: string
}

/** verbose_json carries segment timestamps the SDK's Transcription type leaves out. */
function extractSegments(result: unknown): RawSpan[] {
  if (typeof result !== 'object' || result === null || !('segments' in result)) return []
  const { segments } = result
  if (!Array.isArray(segments)) return []
  return segments.filter((s): s is RawSpan => typeof s === 'object' && s !== null)
}

/**
 * Whisper over an OpenAI-compatible endpoint (Groq by default). The video file is sent
 * as-is; the provider extracts the audio track.
 */
export function createWhisperTranscriber(options: WhisperTranscriberOptions): Transcriber {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL })

  return {
    async transcribe(audioFilePath: string, signal?: AbortSignal): Promise<RawSpan[]> {
      const transcription = await openai.audio.transcriptions.create(
        {
          file: fs.createReadStream(audioFilePath),
          model: options.model,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
        },
        { signal }
      )
      return extractSegments(transcription)
    },
  }
}
