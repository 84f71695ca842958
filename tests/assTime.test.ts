import assert from 'node:assert/strict'
import test from 'node:test'
import { formatAssTime, parseAssTime } from '../src/utils/assTime'

test('formatAssTime pads minutes and seconds but not hours', () => {
  assert.equal(formatAssTime(0), '0:00:00.00')
  assert.equal(formatAssTime(2.5), '0:00:02.50')
  assert.equal(formatAssTime(65), '0:01:05.00')
  assert.equal(formatAssTime(36000), '10:00:00.00')
})

test('formatAssTime truncates centiseconds instead of rounding', () => {
  assert.equal(formatAssTime(3661.999), '1:01:01.99')
  assert.equal(formatAssTime(1.005), '0:00:01.00')
  assert.equal(formatAssTime(59.999), '0:00:59.99')
})

test('formatAssTime absorbs float error on exact centiseconds', () => {
  assert.equal(formatAssTime(2.3), '0:00:02.30')
  assert.equal(formatAssTime(0.29), '0:00:00.29')
})

test('formatAssTime renders negative and non-finite input as zero', () => {
  assert.equal(formatAssTime(-4.2), '0:00:00.00')
  assert.equal(formatAssTime(Number.NaN), '0:00:00.00')
  assert.equal(formatAssTime(Number.POSITIVE_INFINITY), '0:00:00.00')
})

test('parseAssTime reads time-codes and rejects anything else', () => {
  assert.ok(Math.abs(parseAssTime('1:01:01.99') - 3661.99) < 1e-9)
  assert.equal(parseAssTime('0:00:02.50'), 2.5)
  assert.ok(Number.isNaN(parseAssTime('00:00:02,500')))
  assert.ok(Number.isNaN(parseAssTime('0:61:00.00')))
  assert.ok(Number.isNaN(parseAssTime('')))
})

test('format then parse stays within 0.01s across [0, 36000)', () => {
  // Fixed-seed LCG so failures are reproducible
  let seed = 42
  const next = () => {
    seed = (seed * 1664525 + 1013904223) % 4294967296
    return seed / 4294967296
  }
  const samples = [0, 0.004, 0.01, 0.999, 59.995, 3599.999, 35999.999]
  for (let i = 0; i < 2000; i++) samples.push(next() * 36000)

  for (const t of samples) {
    const decoded = parseAssTime(formatAssTime(t))
    assert.ok(Math.abs(decoded - t) < 0.01, `round trip of ${t} gave ${decoded}`)
  }
})
