import { describe, it, expect, vi, afterEach } from 'vitest'
import { SessionController } from '@/lib/session/controller'
import type { ControllerSettings, TickTimer } from '@/lib/session/controller'
import { Grid } from '@/lib/life/grid'
import { Button } from '@/lib/input/mouse'
import type { PointerEvent } from '@/lib/input/mouse'
import { ScreenBuffer } from '@/lib/screen/buffer'
import type { FlushKind } from '@/lib/screen/buffer'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** Timer that only fires when the test says so. */
class ManualTimer implements TickTimer {
  pending: (() => void) | null = null
  delays: number[] = []

  arm(callback: () => void, delayMs: number): void {
    this.pending = callback
    this.delays.push(delayMs)
  }

  cancel(): void {
    this.pending = null
  }

  fire(): void {
    const callback = this.pending
    this.pending = null
    callback?.()
  }
}

const SETTINGS: ControllerSettings = {
  tickIntervalMs: 500,
  intervalStepMs: 50,
  statusWidth: 10,
  aliveGlyph: 'X',
  deadGlyph: ' ',
}

/** Surface of a 20x6 terminal: a 10-column status panel and a 10x5 grid. */
function setup(grid?: Grid) {
  const buffer = new ScreenBuffer(20, 5)
  const timer = new ManualTimer()
  const controller = new SessionController({ surface: buffer, settings: SETTINGS, grid, timer })
  return { buffer, timer, controller }
}

function line(buffer: ScreenBuffer, y: number): string {
  return buffer.line(y).trimEnd()
}

function press(x: number, y: number, overrides?: Partial<PointerEvent>): PointerEvent {
  return {
    x,
    y,
    buttons: Button.Primary,
    released: false,
    motion: false,
    shift: false,
    meta: false,
    ctrl: false,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('SessionController', () => {
  describe('construction', () => {
    it('should size the grid to the surface minus the status panel', () => {
      const { controller } = setup()
      expect(controller.grid.width).toBe(10)
      expect(controller.grid.height).toBe(5)
      expect(controller.store.getState()).toMatchObject({
        width: 10,
        height: 5,
        generation: 0,
        running: false,
        tickInterval: 500,
        quit: false,
      })
    })

    it('should refuse a terminal too narrow for any grid column', () => {
      const buffer = new ScreenBuffer(10, 5)
      expect(() => new SessionController({ surface: buffer, settings: SETTINGS })).toThrow(RangeError)
    })
  })

  describe('start', () => {
    it('should paint the status panel and arm the first tick', () => {
      const { buffer, timer, controller } = setup()
      controller.start()
      expect(buffer.lines().map((l) => l.trimEnd())).toEqual(['10x5', 'Pause', 'Gen: 0', '500ms', ''])
      expect(buffer.version).toBe(1)
      expect(timer.delays).toEqual([500])
      expect(controller.isStarted).toBe(true)
    })

    it('should paint the key hints below the status when the surface is tall enough', () => {
      const buffer = new ScreenBuffer(20, 9)
      const controller = new SessionController({ surface: buffer, settings: SETTINGS, timer: new ManualTimer() })
      controller.start()
      expect(buffer.lines().slice(4).map((l) => l.trimEnd())).toEqual([
        '',
        'Spc Play',
        '← Faster',
        '→ Slower',
        'q Quit',
      ])
    })

    it('should paint seeded live cells', () => {
      const { buffer, controller } = setup(
        Grid.fromRows(['..........', '..........', '...###....', '..........', '..........']),
      )
      controller.start()
      expect(line(buffer, 2)).toBe('Gen: 0       XXX')
      expect(buffer.getCell(13, 2)).toEqual({ glyph: 'X', style: 'alive' })
    })
  })

  describe('tick', () => {
    it('should do no work while paused but keep rearming', () => {
      const { buffer, timer, controller } = setup(Grid.fromRows(['..........', '..........', '...###....']))
      controller.start()
      timer.fire()
      timer.fire()
      expect(controller.grid.generation).toBe(0)
      expect(controller.store.getState().generation).toBe(0)
      expect(buffer.version).toBe(1)
      expect(timer.delays).toEqual([500, 500, 500])
    })

    it('should step, draw only the changed cells and update the status while playing', () => {
      const { buffer, timer, controller } = setup(
        Grid.fromRows(['..........', '..........', '...###....', '..........', '..........']),
      )
      controller.start()
      controller.dispatch({ type: 'toggle_play' })
      timer.fire()

      expect(controller.store.getState().generation).toBe(1)
      expect(controller.grid.generation).toBe(1)
      expect(line(buffer, 1)).toBe('Play          X')
      expect(line(buffer, 2)).toBe('Gen: 1')
      expect(line(buffer, 3)).toBe('500ms         X')
      expect(timer.delays).toEqual([500, 500])
    })

    it('should rearm with the interval current at tick time', () => {
      const { timer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'speed_up' })
      expect(timer.delays).toEqual([500])
      timer.fire()
      expect(timer.delays).toEqual([500, 450])
    })

    it('should not arm a timer for a tick dispatched before start', () => {
      const { timer, controller } = setup()
      controller.dispatch({ type: 'tick' })
      expect(timer.delays).toEqual([])
    })
  })

  describe('speed', () => {
    it('should lengthen the interval on slow_down and show it', () => {
      const { buffer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'slow_down' })
      expect(controller.store.getState().tickInterval).toBe(550)
      expect(line(buffer, 3)).toBe('550ms')
    })

    it('should never drive the interval below zero', () => {
      const { buffer, controller } = setup()
      controller.start()
      for (let i = 0; i < 40; i++) {
        controller.dispatch({ type: 'speed_up' })
      }
      expect(controller.store.getState().tickInterval).toBe(0)
      expect(line(buffer, 3)).toBe('0ms')
    })

    it('should not touch the running flag', () => {
      const { controller } = setup()
      controller.dispatch({ type: 'toggle_play' })
      controller.dispatch({ type: 'slow_down' })
      controller.dispatch({ type: 'speed_up' })
      expect(controller.store.getState().running).toBe(true)
    })
  })

  describe('toggle_cell', () => {
    it('should flip the cell and draw it whether or not the simulation plays', () => {
      const { buffer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'toggle_cell', x: 0, y: 0 })
      expect(controller.grid.get(0, 0)).toBe(1)
      expect(buffer.getCell(10, 0)).toEqual({ glyph: 'X', style: 'alive' })

      controller.dispatch({ type: 'toggle_play' })
      controller.dispatch({ type: 'toggle_cell', x: 0, y: 0 })
      expect(controller.grid.get(0, 0)).toBe(0)
      expect(buffer.getCell(10, 0)).toEqual({ glyph: ' ', style: 'dead' })
      expect(controller.store.getState().generation).toBe(0)
    })

    it('should ignore coordinates outside the grid', () => {
      const { buffer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'toggle_cell', x: 10, y: 0 })
      controller.dispatch({ type: 'toggle_cell', x: 0, y: -1 })
      expect(controller.grid.population).toBe(0)
      expect(buffer.version).toBe(1)
    })
  })

  describe('pointer', () => {
    it('should map a primary press on the grid to a cell toggle', () => {
      const { controller } = setup()
      controller.pointer(press(12, 2))
      expect(controller.grid.liveCells()).toEqual([{ x: 2, y: 2 }])
    })

    it('should ignore presses inside the status panel', () => {
      const { controller } = setup()
      controller.pointer(press(5, 2))
      controller.pointer(press(9, 0))
      expect(controller.grid.population).toBe(0)
    })

    it('should ignore releases and other buttons', () => {
      const { controller } = setup()
      controller.pointer(press(12, 2, { released: true, buttons: 0 }))
      controller.pointer(press(12, 2, { buttons: Button.Secondary }))
      controller.pointer(press(12, 2, { buttons: Button.WheelUp }))
      expect(controller.grid.population).toBe(0)
    })

    it('should ignore presses below the grid', () => {
      const { controller } = setup()
      controller.pointer(press(12, 5))
      expect(controller.grid.population).toBe(0)
    })
  })

  describe('resize', () => {
    it('should pause, keep the overlap, leave out the last terminal row and resync', () => {
      const { buffer, controller } = setup()
      const flushes: FlushKind[] = []
      buffer.subscribe((kind) => flushes.push(kind))
      controller.start()
      controller.dispatch({ type: 'toggle_cell', x: 1, y: 1 })
      controller.dispatch({ type: 'toggle_cell', x: 9, y: 4 })
      controller.dispatch({ type: 'toggle_play' })

      controller.dispatch({ type: 'resize', columns: 15, rows: 4 })

      expect(controller.store.getState()).toMatchObject({ width: 5, height: 3, running: false, generation: 0 })
      expect(controller.grid.liveCells()).toEqual([{ x: 1, y: 1 }])
      expect(buffer.columns).toBe(15)
      expect(buffer.rows).toBe(3)
      expect(buffer.lines().map((l) => l.trimEnd())).toEqual(['5x3', 'Pause      X', 'Gen: 0'])
      expect(flushes[flushes.length - 1]).toBe('sync')
    })

    it('should ignore a size that leaves no grid', () => {
      const { controller } = setup()
      controller.dispatch({ type: 'toggle_play' })
      controller.dispatch({ type: 'resize', columns: 10, rows: 8 })
      controller.dispatch({ type: 'resize', columns: 30, rows: 1 })
      expect(controller.store.getState()).toMatchObject({ width: 10, height: 5, running: true })
      expect(controller.grid.width).toBe(10)
    })
  })

  describe('quit', () => {
    it('should raise the termination signal and cancel the pending tick', () => {
      const { timer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'quit' })
      expect(controller.store.getState().quit).toBe(true)
      expect(timer.pending).toBeNull()
      expect(controller.isStarted).toBe(false)
    })

    it('should ignore every action afterwards', () => {
      const { timer, controller } = setup()
      controller.start()
      controller.dispatch({ type: 'quit' })
      controller.dispatch({ type: 'toggle_play' })
      controller.dispatch({ type: 'toggle_cell', x: 0, y: 0 })
      controller.dispatch({ type: 'tick' })
      controller.start()
      expect(controller.store.getState().running).toBe(false)
      expect(controller.grid.population).toBe(0)
      expect(timer.delays).toEqual([500])
    })
  })

  describe('with the default timer', () => {
    afterEach(() => {
      vi.useRealTimers()
    })

    it('should tick on setTimeout and stop on quit', () => {
      vi.useFakeTimers()
      const buffer = new ScreenBuffer(20, 6)
      const controller = new SessionController({ surface: buffer, settings: SETTINGS })
      controller.start()
      controller.dispatch({ type: 'toggle_play' })

      vi.advanceTimersByTime(500)
      expect(controller.store.getState().generation).toBe(1)
      vi.advanceTimersByTime(499)
      expect(controller.store.getState().generation).toBe(1)
      vi.advanceTimersByTime(1)
      expect(controller.store.getState().generation).toBe(2)

      controller.dispatch({ type: 'quit' })
      expect(vi.getTimerCount()).toBe(0)
      vi.advanceTimersByTime(5000)
      expect(controller.store.getState().generation).toBe(2)
    })
  })
})
