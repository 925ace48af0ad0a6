/**
 * Text helpers for writing strings onto a DisplaySurface.
 */

import stringWidth from 'string-width'

import type { CellStyle, DisplaySurface } from './types'

/**
 * Write `text` starting at (x, y), one code point per cell.
 *
 * Wide glyphs take two columns; the trailing column gets an empty glyph so
 * row text keeps its alignment. A zero-width code point (a combining mark)
 * is drawn over a space. Writing stops before any glyph that would cross
 * `maxX`.
 *
 * Returns the column after the last glyph written.
 */
export function emitText(
  surface: DisplaySurface,
  x: number,
  y: number,
  text: string,
  style: CellStyle = 'text',
  maxX: number = surface.columns,
): number {
  let col = x
  for (const ch of text) {
    let glyph = ch
    let width = stringWidth(ch)
    if (width === 0) {
      glyph = ` ${ch}`
      width = 1
    }
    if (col + width > maxX) break

    surface.setCell(col, y, glyph, style)
    for (let i = 1; i < width; i++) {
      surface.setCell(col + i, y, '', style)
    }
    col += width
  }
  return col
}

/** Blank a rectangle of cells. */
export function blankArea(
  surface: DisplaySurface,
  x: number,
  y: number,
  width: number,
  height: number,
): void {
  for (let row = y; row < y + height; row++) {
    for (let col = x; col < x + width; col++) {
      surface.setCell(col, row, ' ', 'dead')
    }
  }
}
