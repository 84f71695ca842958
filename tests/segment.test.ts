import assert from 'node:assert/strict'
import test from 'node:test'
import { enforceDurationBound, normalizeSegments, totalDuration } from '../src/models/Segment'

test('normalizeSegments drops empty text and reversed time ranges', () => {
  const segments = normalizeSegments([
    { start: 1, end: 2, text: 'a' },
    { start: 3, end: 2, text: 'b' },
    { start: 4, end: 5, text: '' },
  ])
  assert.deepEqual(segments, [{ start: 1, end: 2, text: 'a' }])
})

test('normalizeSegments drops spans with missing fields, blank text, zero length or negative start', () => {
  const segments = normalizeSegments([
    { end: 2, text: 'no start' },
    { start: 1, text: 'no end' },
    { start: 1, end: 2 },
    { start: 1, end: 2, text: '   ' },
    { start: 2, end: 2, text: 'zero length' },
    { start: -1, end: 2, text: 'negative' },
    { start: 'soon', end: 2, text: 'not a number' },
    { start: 1, end: 2, text: 42 },
  ])
  assert.deepEqual(segments, [])
})

test('normalizeSegments trims text, accepts numeric strings and keeps provider order', () => {
  const segments = normalizeSegments([
    { start: 5, end: 7, text: '  later ', id: 1 },
    { start: '1.5', end: '3', text: 'earlier' },
    { start: 6, end: 8, text: 'overlapping' },
  ])
  assert.deepEqual(segments, [
    { start: 5, end: 7, text: 'later' },
    { start: 1.5, end: 3, text: 'earlier' },
    { start: 6, end: 8, text: 'overlapping' },
  ])
})

test('totalDuration is the latest end, not the last one', () => {
  assert.equal(totalDuration([]), 0)
  assert.equal(
    totalDuration([
      { start: 0, end: 12, text: 'a' },
      { start: 3, end: 4, text: 'b' },
    ]),
    12
  )
})

test('enforceDurationBound rejects speech past the limit and accepts the limit itself', () => {
  const tooLong = enforceDurationBound([{ start: 300, end: 310, text: 'x' }], 300)
  assert.deepEqual(tooLong, { ok: false, duration: 310, maxSeconds: 300 })

  const atLimit = enforceDurationBound([{ start: 290, end: 300, text: 'x' }], 300)
  assert.deepEqual(atLimit, { ok: true, duration: 300 })

  assert.deepEqual(enforceDurationBound([], 300), { ok: true, duration: 0 })
})
