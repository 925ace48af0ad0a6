/**
 * SGR mouse report decoding.
 *
 * With `ESC[?1000h ESC[?1006h` enabled the terminal reports button presses
 * as `ESC[<b;x;yM` and releases as `ESC[<b;x;ym`, with 1-based x/y. Ink
 * hands these to input handlers with the leading ESC stripped, so both
 * forms are accepted. Several reports may arrive in one chunk.
 */

/** Button mask bits, mirroring the usual terminal library layout. */
export const Button = {
  Primary: 1,
  Middle: 2,
  Secondary: 4,
  WheelUp: 8,
  WheelDown: 16,
} as const

export interface PointerEvent {
  /** 0-based screen column. */
  x: number
  /** 0-based screen row. */
  y: number
  /** Buttons held for this report; 0 on release. */
  buttons: number
  released: boolean
  /** Reported while moving (drag tracking modes only). */
  motion: boolean
  shift: boolean
  meta: boolean
  ctrl: boolean
}

const SGR_REPORT = /\x1b?\[<(\d+);(\d+);(\d+)([Mm])/g
const SGR_PREFIX = /^\x1b?\[<\d+;\d+;\d+[Mm]/

const SHIFT_BIT = 4
const META_BIT = 8
const CTRL_BIT = 16
const MOTION_BIT = 32
const WHEEL_BIT = 64

function buttonMask(code: number, released: boolean): number {
  if (released) return 0
  const low = code & 3
  if (code & WHEEL_BIT) {
    if (low === 0) return Button.WheelUp
    if (low === 1) return Button.WheelDown
    return 0
  }
  if (low === 0) return Button.Primary
  if (low === 1) return Button.Middle
  if (low === 2) return Button.Secondary
  return 0
}

/** True when `input` starts with an SGR mouse report. */
export function isMouseReport(input: string): boolean {
  return SGR_PREFIX.test(input)
}

export function parseMouseReports(input: string): PointerEvent[] {
  const events: PointerEvent[] = []
  for (const match of input.matchAll(SGR_REPORT)) {
    const code = Number(match[1])
    const released = match[4] === 'm'
    events.push({
      x: Number(match[2]) - 1,
      y: Number(match[3]) - 1,
      buttons: buttonMask(code, released),
      released,
      motion: (code & MOTION_BIT) !== 0,
      shift: (code & SHIFT_BIT) !== 0,
      meta: (code & META_BIT) !== 0,
      ctrl: (code & CTRL_BIT) !== 0,
    })
  }
  return events
}
