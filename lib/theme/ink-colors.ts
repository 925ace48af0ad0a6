/**
 * Chalk-based color mappers for terminal (Ink) rendering.
 *
 * All functions are curried: `cellColor('alive', palette)('X')` returns a
 * colored string.
 *
 * Requires chalk@5+ (ESM). No side effects on import.
 */

import chalk from 'chalk'

import type { CellStyle } from '../screen/types'

export interface Palette {
  /** Hex color for live cells. */
  alive: string
}

/** Return a chalk formatter for a screen cell style. */
export function cellColor(style: CellStyle, palette: Palette): (text: string) => string {
  switch (style) {
    case 'alive':
      return (text: string) => chalk.hex(palette.alive)(text)
    case 'hint':
      return (text: string) => chalk.dim(text)
    case 'text':
    case 'dead':
      return (text: string) => text
  }
}
