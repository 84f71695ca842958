import assert from 'node:assert/strict'
import test from 'node:test'
import { StageTimeoutError, hasErrorCode, withTimeout } from '../src/utils/errors'
import { abortableDelay } from './helpers/fakes'

test('withTimeout returns the value of a call that finishes in time', async () => {
  assert.equal(await withTimeout(async () => 'done', 50, 'quick'), 'done')
})

test('withTimeout passes through rejections from the call', async () => {
  await assert.rejects(
    withTimeout(async () => {
      throw new Error('provider down')
    }, 50, 'failing'),
    /provider down/
  )
})

test('withTimeout aborts the call and reports the timeout after the call settles', async () => {
  let signal: AbortSignal | undefined
  let settled = false
  const run = withTimeout(
    async (s) => {
      signal = s
      try {
        await abortableDelay(60_000, s)
      } finally {
        settled = true
      }
    },
    20,
    'render'
  )

  await assert.rejects(run, (err: unknown) => err instanceof StageTimeoutError && err.message === 'render timed out after 20ms')
  assert.equal(signal?.aborted, true)
  assert.ok(signal?.reason instanceof StageTimeoutError)
  assert.equal(settled, true)
})

test('withTimeout waits for a call that ignores the abort', async () => {
  let finished = false
  const run = withTimeout(
    async () => {
      await abortableDelay(60)
      finished = true
    },
    10,
    'upload'
  )

  await assert.rejects(run, StageTimeoutError)
  assert.equal(finished, true)
})

test('withTimeout with a zero budget never aborts', async () => {
  let signal: AbortSignal | undefined
  const value = await withTimeout(
    async (s) => {
      signal = s
      await abortableDelay(30)
      return 7
    },
    0,
    'untimed'
  )
  assert.equal(value, 7)
  assert.equal(signal?.aborted, false)
})

test('hasErrorCode matches system errors by code', () => {
  const err = Object.assign(new Error('missing'), { code: 'ENOENT' })
  assert.equal(hasErrorCode(err, 'ENOENT'), true)
  assert.equal(hasErrorCode(err, 'EACCES'), false)
  assert.equal(hasErrorCode('ENOENT', 'ENOENT'), false)
})
