import type { Segment } from './Segment'

/** Chat (or user) the job reports progress, errors and the final video to. */
export type DestinationId = string | number

export type JobStage =
  | 'admitted'
  | 'downloaded'
  | 'transcribed'
  | 'validated'
  | 'duration-checked'
  | 'translated'
  | 'serialized'
  | 'rendered'
  | 'delivered'
  | 'failed'
  | 'cleaned'

export type JobFailureKind = 'transport' | 'no-speech' | 'too-long' | 'timeout' | 'processing'

export interface JobFailure {
  kind: JobFailureKind
  /** Stage the job was in when it failed. */
  stage: JobStage
  message: string
  /** Seconds; set for too-long. */
  duration?: number
  cause?: unknown
}

export type StageResult<T> = { ok: true; value: T } | { ok: false; failure: JobFailure }

export type JobOutcome =
  | { status: 'delivered'; segmentCount: number }
  | { status: 'failed'; failure: JobFailure }

/** What the transport hands over when a video arrives. Bytes are fetched inside the job. */
export interface VideoJobInput {
  destinationId: DestinationId
  filenameHint?: string
  /** Must stop (reject) once signal aborts. */
  download: (signal?: AbortSignal) => Promise<Buffer>
}

export interface VideoJob extends VideoJobInput {
  id: string
  stage: JobStage
  segments: Segment[]
  /** Temp files owned by this job; all removed on cleanup. */
  artifacts: Set<string>
  createdAt: Date
}

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value }
}

export function fail<T>(failure: JobFailure): StageResult<T> {
  return { ok: false, failure }
}
