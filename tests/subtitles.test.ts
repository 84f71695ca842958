import assert from 'node:assert/strict'
import fs from 'node:fs'
import path from 'node:path'
import test from 'node:test'
import {
  buildAssDocument,
  buildAssHeader,
  buildDialogueLine,
  escapeAssText,
  writeSubtitleTrack,
} from '../src/services/subtitles'
import { withTempDir } from './helpers/fakes'

const segments = [
  { start: 0, end: 2.5, text: 'שלום' },
  { start: 2.5, end: 5, text: 'עולם' },
]

test('header declares the canvas, one bottom-center style and the event format', () => {
  const lines = buildAssHeader().split('\n')
  assert.deepEqual(lines.slice(0, 6), [
    '[Script Info]',
    'ScriptType: v4.00+',
    'PlayResX: 1280',
    'PlayResY: 720',
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
  ])
  assert.ok(
    lines.includes(
      'Style: Default,NotoSansHebrew,42,&H00FFFFFF,&H000000FF,&H00000000,&H64000000,0,0,0,0,100,100,0,0,1,3,1,2,20,20,35,1'
    )
  )
  assert.equal(lines[lines.length - 2], 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text')
  assert.equal(lines[lines.length - 1], '')
})

test('dialogue lines force RTL and turn newlines into \\N', () => {
  assert.equal(
    buildDialogueLine({ start: 1, end: 2.5, text: 'שורה אחת\nשורה שתיים' }),
    'Dialogue: 0,0:00:01.00,0:00:02.50,Default,,0,0,0,,{\\rtl}שורה אחת\\Nשורה שתיים'
  )
})

test('escapeAssText normalizes CRLF and drops braces', () => {
  assert.equal(escapeAssText('a\r\nb\rc'), 'a\\Nb\\Nc')
  assert.equal(escapeAssText('{\\b1}bold'), '\\b1bold')
})

test('document has one event per segment in the given order', () => {
  const reversed = [...segments].reverse()
  const doc = buildAssDocument(reversed)
  const events = doc.split('\n').filter((l) => l.startsWith('Dialogue:'))

  assert.deepEqual(events, [
    'Dialogue: 0,0:00:02.50,0:00:05.00,Default,,0,0,0,,{\\rtl}עולם',
    'Dialogue: 0,0:00:00.00,0:00:02.50,Default,,0,0,0,,{\\rtl}שלום',
  ])
  assert.ok(doc.startsWith(buildAssHeader()))
  assert.ok(doc.endsWith('{\\rtl}שלום\n'))
})

test('an empty segment list still yields a complete header', () => {
  assert.equal(buildAssDocument([]), buildAssHeader())
})

test('writeSubtitleTrack writes identical documents to distinct files', async () => {
  await withTempDir('subtitles-test', async (dir) => {
    const first = await writeSubtitleTrack(segments, dir)
    const second = await writeSubtitleTrack(segments, dir)

    assert.notEqual(first, second)
    assert.equal(path.dirname(first), dir)
    assert.match(path.basename(first), /^subbot-subs-[0-9a-f-]{36}\.ass$/)
    assert.deepEqual(fs.readFileSync(first), fs.readFileSync(second))
    assert.equal(fs.readFileSync(first, 'utf-8'), buildAssDocument(segments))
  })
})
