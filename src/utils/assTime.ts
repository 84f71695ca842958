/**
 * ASS time-codes: H:MM:SS.cc with an unpadded hour and truncated centiseconds.
 */

/** Absorbs binary float error (2.3 * 100 === 229.99999999999997) before truncating. */
const CENTISECOND_EPSILON = 1e-6

const ASS_TIME_REGEX = /^(\d+):([0-5]\d):([0-5]\d)\.(\d{2})$/

const pad2 = (n: number) => String(n).padStart(2, '0')

/** Negative and non-finite offsets render as 0:00:00.00. */
export function formatAssTime(seconds: number): string {
  const safe = Number.isFinite(seconds) && seconds > 0 ? seconds : 0
  const totalCs = Math.floor(safe * 100 + CENTISECOND_EPSILON)
  const h = Math.floor(totalCs / 360000)
  const m = Math.floor((totalCs % 360000) / 6000)
  const s = Math.floor((totalCs % 6000) / 100)
  const cs = totalCs % 100
  return `${h}:${pad2(m)}:${pad2(s)}.${pad2(cs)}`
}

/** Inverse of formatAssTime. NaN when the text is not a time-code. */
export function parseAssTime(text: string): number {
  const match = text.trim().match(ASS_TIME_REGEX)
  if (!match) return NaN
  const [, h, m, s, cs] = match
  return Number(h) * 3600 + Number(m) * 60 + Number(s) + Number(cs) / 100
}
