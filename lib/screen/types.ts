/**
 * Display surface capability used by the session controller.
 *
 * Renderer-agnostic: the controller only ever writes single cells and asks
 * for a flush. Whatever puts pixels on the terminal implements this.
 */

/** How a cell should be drawn. Mapped to colors by the renderer. */
export type CellStyle = 'text' | 'hint' | 'alive' | 'dead'

export interface DisplaySurface {
  /** Terminal size in character cells. */
  readonly columns: number
  readonly rows: number
  /** Write one glyph at a screen position. Out-of-range writes are dropped. */
  setCell(x: number, y: number, glyph: string, style?: CellStyle): void
  /** Blank the whole surface. */
  clear(): void
  /** Adopt a new terminal size. Content is discarded. */
  resize(columns: number, rows: number): void
  /** Flush pending cell writes to the display. */
  show(): void
  /** Full redraw after the terminal changed under us (resize). */
  sync(): void
}
