/**
 * Cell-level types shared by the grid engine, the session controller and
 * the renderer. No side effects on import.
 */

/** A cell is either dead (0) or alive (1). */
export type CellState = 0 | 1

/** Grid-space coordinate: column `x`, row `y`. */
export interface CellPoint {
  x: number
  y: number
}

/** A cell whose state differs between two consecutive generations. */
export interface CellChange extends CellPoint {
  /** State in the new generation. */
  state: CellState
}
