/**
 * Status panel content: the text lines drawn in the left margin.
 */

import { getHints } from '../keys/bindings'
import type { SessionState } from '../session/types'

import { blankArea, emitText } from './text'
import type { DisplaySurface } from './types'

/** Rows 0..STATUS_ROWS-1 hold session status; key hints follow a blank row. */
export const STATUS_ROWS = 4

export function statusLines(state: SessionState): string[] {
  return [
    `${state.width}x${state.height}`,
    state.running ? 'Play' : 'Pause',
    `Gen: ${state.generation}`,
    `${state.tickInterval}ms`,
  ]
}

export function hintLines(): string[] {
  return getHints().map((hint) => `${hint.key} ${hint.description}`)
}

/** Blank the status rows, then write the current status into them. */
export function drawStatus(
  surface: DisplaySurface,
  state: SessionState,
  statusWidth: number,
): void {
  blankArea(surface, 0, 0, statusWidth, STATUS_ROWS)
  statusLines(state).forEach((line, row) => {
    emitText(surface, 0, row, line, 'text', statusWidth)
  })
}

/** Key hints below the status rows. Only changes after a full clear. */
export function drawHints(surface: DisplaySurface, statusWidth: number): void {
  hintLines().forEach((line, i) => {
    emitText(surface, 0, STATUS_ROWS + 1 + i, line, 'hint', statusWidth)
  })
}
