/**
 * In-memory character screen implementing DisplaySurface.
 *
 * Cell writes land in a flat array; show() and sync() bump a version number
 * and notify subscribers, which is when the Ink view re-renders. Rows are
 * exposed as runs of same-style text so the renderer colors whole spans
 * instead of single characters.
 */

import type { CellStyle, DisplaySurface } from './types'

export interface ScreenCell {
  glyph: string
  style: CellStyle
}

export interface ScreenRun {
  text: string
  style: CellStyle
}

export type FlushKind = 'show' | 'sync'

const BLANK: ScreenCell = Object.freeze({ glyph: ' ', style: 'dead' })

export class ScreenBuffer implements DisplaySurface {
  private _columns: number
  private _rows: number
  private _cells: ScreenCell[]
  private _version = 0
  private _listeners: Set<(kind: FlushKind) => void> = new Set()

  constructor(columns: number, rows: number) {
    this._columns = Math.max(0, columns)
    this._rows = Math.max(0, rows)
    this._cells = new Array<ScreenCell>(this._columns * this._rows).fill(BLANK)
  }

  get columns(): number {
    return this._columns
  }

  get rows(): number {
    return this._rows
  }

  /** Incremented on every flush. */
  get version(): number {
    return this._version
  }

  setCell(x: number, y: number, glyph: string, style: CellStyle = 'text'): void {
    if (x < 0 || y < 0 || x >= this._columns || y >= this._rows) return
    this._cells[y * this._columns + x] = { glyph, style }
  }

  getCell(x: number, y: number): ScreenCell | undefined {
    if (x < 0 || y < 0 || x >= this._columns || y >= this._rows) return undefined
    return this._cells[y * this._columns + x]
  }

  clear(): void {
    this._cells.fill(BLANK)
  }

  resize(columns: number, rows: number): void {
    this._columns = Math.max(0, columns)
    this._rows = Math.max(0, rows)
    this._cells = new Array<ScreenCell>(this._columns * this._rows).fill(BLANK)
  }

  show(): void {
    this._flush('show')
  }

  sync(): void {
    this._flush('sync')
  }

  /** Subscribe to flushes. Returns the unsubscribe function. */
  subscribe(listener: (kind: FlushKind) => void): () => void {
    this._listeners.add(listener)
    return () => {
      this._listeners.delete(listener)
    }
  }

  /** Plain text of one row. */
  line(y: number): string {
    let text = ''
    for (let x = 0; x < this._columns; x++) {
      text += this._cells[y * this._columns + x].glyph
    }
    return text
  }

  lines(): string[] {
    return Array.from({ length: this._rows }, (_, y) => this.line(y))
  }

  /** One row split into runs of consecutive cells sharing a style. */
  runs(y: number): ScreenRun[] {
    const result: ScreenRun[] = []
    for (let x = 0; x < this._columns; x++) {
      const cell = this._cells[y * this._columns + x]
      const last = result[result.length - 1]
      if (last && last.style === cell.style) {
        last.text += cell.glyph
      } else {
        result.push({ text: cell.glyph, style: cell.style })
      }
    }
    return result
  }

  private _flush(kind: FlushKind): void {
    this._version++
    for (const listener of this._listeners) {
      listener(kind)
    }
  }
}
