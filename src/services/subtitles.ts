import fs from 'fs'
import type { Segment } from '../models/Segment'
import { formatAssTime } from '../utils/assTime'
import { createTempPath, removeQuietly } from '../utils/tempFiles'

/** The single visual preset. Colours are &HAABBGGRR. */
export interface AssStyle {
  fontName: string
  fontSize: number
  primaryColour: string
  secondaryColour: string
  outlineColour: string
  backColour: string
  outline: number
  shadow: number
  /** Numpad layout: 2 = bottom-center. */
  alignment: number
  marginL: number
  marginR: number
  marginV: number
}

export const DEFAULT_ASS_STYLE: AssStyle = {
  fontName: 'NotoSansHebrew',
  fontSize: 42,
  primaryColour: '&H00FFFFFF',
  secondaryColour: '&H000000FF',
  outlineColour: '&H00000000',
  backColour: '&H64000000',
  outline: 3,
  shadow: 1,
  alignment: 2,
  marginL: 20,
  marginR: 20,
  marginV: 35,
}

export const PLAY_RES_X = 1280
export const PLAY_RES_Y = 720

/** Forces right-to-left layout for the whole event. */
export const RTL_OVERRIDE = '{\\rtl}'

const STYLE_FORMAT =
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, ' +
  'BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, ' +
  'BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding'

const EVENT_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text'

export function buildAssHeader(style: AssStyle = DEFAULT_ASS_STYLE): string {
  const styleLine =
    `Style: Default,${style.fontName},${style.fontSize},${style.primaryColour},${style.secondaryColour},` +
    `${style.outlineColour},${style.backColour},0,0,0,0,100,100,0,0,1,${style.outline},${style.shadow},` +
    `${style.alignment},${style.marginL},${style.marginR},${style.marginV},1`

  return (
    `[Script Info]\n` +
    `ScriptType: v4.00+\n` +
    `PlayResX: ${PLAY_RES_X}\n` +
    `PlayResY: ${PLAY_RES_Y}\n` +
    `WrapStyle: 0\n` +
    `ScaledBorderAndShadow: yes\n` +
    `\n` +
    `[V4+ Styles]\n` +
    `${STYLE_FORMAT}\n` +
    `${styleLine}\n` +
    `\n` +
    `[Events]\n` +
    `${EVENT_FORMAT}\n`
  )
}

/** Line breaks become \N; braces are dropped so speech text cannot open override blocks. */
export function escapeAssText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/[{}]/g, '').split('\n').join('\\N')
}

export function buildDialogueLine(segment: Segment): string {
  const start = formatAssTime(segment.start)
  const end = formatAssTime(segment.end)
  return `Dialogue: 0,${start},${end},Default,,0,0,0,,${RTL_OVERRIDE}${escapeAssText(segment.text)}`
}

/**
 * Full ASS document, one Dialogue line per segment in the order given (no sorting).
 */
export function buildAssDocument(segments: readonly Segment[], style: AssStyle = DEFAULT_ASS_STYLE): string {
  return buildAssHeader(style) + segments.map((s) => `${buildDialogueLine(s)}\n`).join('')
}

/**
 * Write the document to a fresh .ass file under dir and return its path.
 * The caller owns the file and removes it.
 */
export async function writeSubtitleTrack(
  segments: readonly Segment[],
  dir: string,
  style: AssStyle = DEFAULT_ASS_STYLE
): Promise<string> {
  const assPath = createTempPath(dir, 'subs', '.ass')
  try {
    await fs.promises.writeFile(assPath, buildAssDocument(segments, style), 'utf-8')
  } catch (err) {
    await removeQuietly(assPath)
    throw err
  }
  return assPath
}
