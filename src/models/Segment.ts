/** A timed span of speech, in seconds from the start of the video. */
export interface Segment {
  start: number
  end: number
  text: string
}

/** Provider output before validation; any field may be missing or mistyped. */
export type RawSpan = Record<string, unknown>

export type DurationCheck =
  | { ok: true; duration: number }
  | { ok: false; duration: number; maxSeconds: number }

function toSeconds(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (typeof value === 'string' && value.trim()) {
    const n = Number(value)
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

/**
 * Keep spans with numeric start/end, start >= 0, end > start and non-empty trimmed text.
 * Everything else is dropped silently. Input order is kept; overlapping or unordered spans
 * pass through.
 */
export function normalizeSegments(rawSpans: readonly RawSpan[]): Segment[] {
  const segments: Segment[] = []
  for (const span of rawSpans) {
    const start = toSeconds(span.start)
    const end = toSeconds(span.end)
    const text = typeof span.text === 'string' ? span.text.trim() : ''
    if (start === undefined || end === undefined || !text) continue
    if (start < 0 || end <= start) continue
    segments.push({ start, end, text })
  }
  return segments
}

/** Latest end across all segments; 0 when there are none. */
export function totalDuration(segments: readonly Segment[]): number {
  return segments.reduce((max, s) => Math.max(max, s.end), 0)
}

/** Hard gate: a job whose speech runs past maxSeconds is rejected whole, never truncated. */
export function enforceDurationBound(segments: readonly Segment[], maxSeconds: number): DurationCheck {
  const duration = totalDuration(segments)
  if (duration > maxSeconds) return { ok: false, duration, maxSeconds }
  return { ok: true, duration }
}
