/**
 * Toroidal cell grid with generation stepping.
 *
 * Cells live in a flat Uint8Array addressed by `y * width + x`. The left and
 * right edges are adjacent, as are the top and bottom ones.
 *
 * Neighbor rule (a deliberate variant, not B3/S23):
 *   - exactly 3 live neighbors: the cell becomes alive
 *   - exactly 4 live neighbors: the cell keeps its state
 *   - anything else: the cell dies
 *
 * step() reads the current generation and writes a fresh array, so a pass
 * never observes its own writes. It returns only the cells that changed,
 * which is all a renderer needs to repaint.
 */

import type { CellChange, CellPoint, CellState } from './types'

const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
]

const LIVE_MARKERS = new Set(['#', 'X', 'x', 'O', '*'])

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Grid ${name} must be a positive integer, got ${value}`)
  }
}

export class Grid {
  private _width: number
  private _height: number
  private _cells: Uint8Array
  private _generation = 0

  constructor(width: number, height: number) {
    assertDimension('width', width)
    assertDimension('height', height)
    this._width = width
    this._height = height
    this._cells = new Uint8Array(width * height)
  }

  /**
   * Build a grid from text rows, one string per row. `#`, `X`, `x`, `O` and
   * `*` mark live cells; any other character is dead. Short rows are padded
   * with dead cells up to the longest row.
   */
  static fromRows(rows: string[]): Grid {
    const width = rows.reduce((max, row) => Math.max(max, row.length), 0)
    const grid = new Grid(width, rows.length)
    rows.forEach((row, y) => {
      for (let x = 0; x < row.length; x++) {
        if (LIVE_MARKERS.has(row[x])) grid._cells[y * width + x] = 1
      }
    })
    return grid
  }

  get width(): number {
    return this._width
  }

  get height(): number {
    return this._height
  }

  /** Number of completed step() passes. */
  get generation(): number {
    return this._generation
  }

  /** Number of live cells. */
  get population(): number {
    let count = 0
    for (const cell of this._cells) count += cell
    return count
  }

  contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this._width &&
      y < this._height
    )
  }

  get(x: number, y: number): CellState {
    return this._cells[y * this._width + x] === 1 ? 1 : 0
  }

  set(x: number, y: number, state: CellState): void {
    this._cells[y * this._width + x] = state
  }

  /**
   * Sum of the 8 wrapped neighbors of (x, y). The cell itself is never one
   * of the offsets, so a lone live cell counts 0. Each offset is counted on
   * its own, so on grids narrower than 3 cells the same cell (or (x, y)
   * itself, through wrapping) can be counted more than once.
   */
  neighborCount(x: number, y: number): number {
    const w = this._width
    const h = this._height
    let count = 0
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      const nx = (x + dx + w) % w
      const ny = (y + dy + h) % h
      count += this._cells[ny * w + nx]
    }
    return count
  }

  nextState(x: number, y: number): CellState {
    const neighbors = this.neighborCount(x, y)
    if (neighbors === 3) return 1
    if (neighbors === 4) return this.get(x, y)
    return 0
  }

  /** Advance one generation. Returns the cells whose state changed. */
  step(): CellChange[] {
    const w = this._width
    const next = new Uint8Array(this._cells.length)
    const changes: CellChange[] = []

    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < w; x++) {
        const state = this.nextState(x, y)
        next[y * w + x] = state
        if (state !== this._cells[y * w + x]) {
          changes.push({ x, y, state })
        }
      }
    }

    this._cells = next
    this._generation++
    return changes
  }

  /** Flip one cell in place and return its new state. */
  toggle(x: number, y: number): CellState {
    const i = y * this._width + x
    this._cells[i] ^= 1
    return this._cells[i] === 1 ? 1 : 0
  }

  /**
   * Reallocate to new dimensions. Cells inside both the old and new bounds
   * keep their state, everything else starts dead. Returns the live cells
   * of the resized grid so the caller can repaint after clearing.
   */
  resize(width: number, height: number): CellPoint[] {
    assertDimension('width', width)
    assertDimension('height', height)

    const next = new Uint8Array(width * height)
    const copyWidth = Math.min(width, this._width)
    const copyHeight = Math.min(height, this._height)
    for (let y = 0; y < copyHeight; y++) {
      for (let x = 0; x < copyWidth; x++) {
        next[y * width + x] = this._cells[y * this._width + x]
      }
    }

    this._width = width
    this._height = height
    this._cells = next
    return this.liveCells()
  }

  liveCells(): CellPoint[] {
    const cells: CellPoint[] = []
    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < this._width; x++) {
        if (this._cells[y * this._width + x] === 1) cells.push({ x, y })
      }
    }
    return cells
  }

  /** Copy of the raw cell array, row-major. */
  snapshot(): Uint8Array {
    return this._cells.slice()
  }
}
