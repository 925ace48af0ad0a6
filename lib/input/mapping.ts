/**
 * Screen-space to grid-space mapping.
 *
 * Ink keeps the terminal's last row free (a frame as tall as the terminal
 * forces a full clear on every render), so the drawable surface is one row
 * shorter than the terminal. The status panel occupies the surface's
 * leftmost `statusWidth` columns; the grid fills the rest, from row 0 to the
 * bottom of the surface.
 */

import type { CellPoint } from '../life/types'

export const RESERVED_ROWS = 1

export interface SurfaceSize {
  columns: number
  rows: number
}

export interface GridSize {
  width: number
  height: number
}

export interface GridLayout extends GridSize {
  statusWidth: number
}

/** Drawable area for a terminal size. */
export function surfaceSizeFor(columns: number, rows: number): SurfaceSize {
  return {
    columns: Math.max(0, columns),
    rows: Math.max(0, rows - RESERVED_ROWS),
  }
}

/** Grid dimensions for a surface size. Either may come out below 1. */
export function gridSizeFor(surface: SurfaceSize, statusWidth: number): GridSize {
  return {
    width: surface.columns - statusWidth,
    height: surface.rows,
  }
}

export function isUsableSize(size: GridSize): boolean {
  return size.width >= 1 && size.height >= 1
}

/**
 * Map a screen position to a grid cell. Returns null inside the status
 * panel and outside the grid.
 */
export function screenToGrid(x: number, y: number, layout: GridLayout): CellPoint | null {
  const gx = x - layout.statusWidth
  if (gx < 0 || gx >= layout.width) return null
  if (y < 0 || y >= layout.height) return null
  return { x: gx, y }
}

/** Screen position of a grid cell. */
export function gridToScreen(x: number, y: number, statusWidth: number): CellPoint {
  return { x: x + statusWidth, y }
}
