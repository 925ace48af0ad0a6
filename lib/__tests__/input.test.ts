import { describe, it, expect } from 'vitest'
import { Button, isMouseReport, parseMouseReports } from '@/lib/input/mouse'
import { gridSizeFor, gridToScreen, isUsableSize, screenToGrid, surfaceSizeFor } from '@/lib/input/mapping'
import { BINDINGS, findBinding, getHints } from '@/lib/keys/bindings'

// ---------------------------------------------------------------------------
// SGR mouse reports
// ---------------------------------------------------------------------------

describe('parseMouseReports', () => {
  it('should decode a left press into 0-based coordinates', () => {
    expect(parseMouseReports('\x1b[<0;11;3M')).toEqual([
      {
        x: 10,
        y: 2,
        buttons: Button.Primary,
        released: false,
        motion: false,
        shift: false,
        meta: false,
        ctrl: false,
      },
    ])
  })

  it('should accept reports with the escape already stripped', () => {
    const [event] = parseMouseReports('[<2;1;1M')
    expect(event.x).toBe(0)
    expect(event.y).toBe(0)
    expect(event.buttons).toBe(Button.Secondary)
  })

  it('should report releases with no buttons held', () => {
    const [event] = parseMouseReports('\x1b[<0;5;5m')
    expect(event.released).toBe(true)
    expect(event.buttons).toBe(0)
  })

  it('should decode the middle button and the wheel', () => {
    const events = parseMouseReports('\x1b[<1;2;2M\x1b[<64;2;2M\x1b[<65;2;2M')
    expect(events.map((e) => e.buttons)).toEqual([Button.Middle, Button.WheelUp, Button.WheelDown])
  })

  it('should decode modifier and motion bits', () => {
    // 4 shift + 8 meta + 16 ctrl + 32 motion on the left button
    const [event] = parseMouseReports('\x1b[<60;3;4M')
    expect(event).toMatchObject({
      buttons: Button.Primary,
      shift: true,
      meta: true,
      ctrl: true,
      motion: true,
    })
  })

  it('should return every report in a chunk in order', () => {
    const events = parseMouseReports('\x1b[<0;3;4M\x1b[<0;3;4m')
    expect(events.map((e) => e.released)).toEqual([false, true])
  })

  it('should return nothing for ordinary keys', () => {
    expect(parseMouseReports('q')).toEqual([])
    expect(parseMouseReports(' ')).toEqual([])
  })
})

describe('isMouseReport', () => {
  it('should recognise reports with or without the escape', () => {
    expect(isMouseReport('\x1b[<0;1;1M')).toBe(true)
    expect(isMouseReport('[<0;1;1m')).toBe(true)
  })

  it('should reject keys', () => {
    expect(isMouseReport('q')).toBe(false)
    expect(isMouseReport('[A')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Screen mapping
// ---------------------------------------------------------------------------

describe('surfaceSizeFor', () => {
  it('should keep the last terminal row out of the drawable area', () => {
    expect(surfaceSizeFor(80, 24)).toEqual({ columns: 80, rows: 23 })
  })

  it('should never report a negative size', () => {
    expect(surfaceSizeFor(0, 0)).toEqual({ columns: 0, rows: 0 })
  })
})

describe('gridSizeFor', () => {
  it('should subtract the status panel from the surface width', () => {
    expect(gridSizeFor({ columns: 80, rows: 23 }, 10)).toEqual({ width: 70, height: 23 })
  })

  it('should flag terminal sizes that leave no grid', () => {
    expect(isUsableSize(gridSizeFor(surfaceSizeFor(10, 24), 10))).toBe(false)
    expect(isUsableSize(gridSizeFor(surfaceSizeFor(80, 1), 10))).toBe(false)
    expect(isUsableSize(gridSizeFor(surfaceSizeFor(11, 2), 10))).toBe(true)
  })
})

describe('screenToGrid', () => {
  const layout = { statusWidth: 10, width: 70, height: 23 }

  it('should shift x by the status width', () => {
    expect(screenToGrid(10, 0, layout)).toEqual({ x: 0, y: 0 })
    expect(screenToGrid(79, 22, layout)).toEqual({ x: 69, y: 22 })
  })

  it('should return null inside the status panel', () => {
    expect(screenToGrid(0, 0, layout)).toBeNull()
    expect(screenToGrid(9, 5, layout)).toBeNull()
  })

  it('should return null past the grid', () => {
    expect(screenToGrid(80, 0, layout)).toBeNull()
    expect(screenToGrid(20, 23, layout)).toBeNull()
  })

  it('should invert gridToScreen', () => {
    const pos = gridToScreen(7, 4, 10)
    expect(pos).toEqual({ x: 17, y: 4 })
    expect(screenToGrid(pos.x, pos.y, layout)).toEqual({ x: 7, y: 4 })
  })
})

// ---------------------------------------------------------------------------
// Key bindings
// ---------------------------------------------------------------------------

describe('findBinding', () => {
  it('should map the control keys to their actions', () => {
    expect(findBinding(' ')?.action).toBe('toggle_play')
    expect(findBinding('leftArrow')?.action).toBe('speed_up')
    expect(findBinding('+')?.action).toBe('speed_up')
    expect(findBinding('rightArrow')?.action).toBe('slow_down')
    expect(findBinding('-')?.action).toBe('slow_down')
  })

  it('should quit on q, Q, escape and return', () => {
    for (const key of ['q', 'Q', 'escape', 'return']) {
      expect(findBinding(key)?.action).toBe('quit')
    }
  })

  it('should ignore unbound keys', () => {
    expect(findBinding('x')).toBeUndefined()
    expect(findBinding('upArrow')).toBeUndefined()
  })

  it('should bind each key only once', () => {
    const keys = BINDINGS.map((b) => b.key)
    expect(new Set(keys).size).toBe(keys.length)
  })
})

describe('getHints', () => {
  it('should list visible bindings with display labels', () => {
    expect(getHints()).toEqual([
      { key: 'Spc', description: 'Play' },
      { key: '←', description: 'Faster' },
      { key: '→', description: 'Slower' },
      { key: 'q', description: 'Quit' },
    ])
  })
})
