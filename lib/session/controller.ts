/**
 * Session controller: the single owner of the grid, the session store and
 * the display surface.
 *
 * Two activities feed it: the input handlers (keys, pointer, resize) and a
 * tick timer. Both go through dispatch(), and since every dispatch runs to
 * completion on the event loop before the next one starts, the grid and the
 * session state only ever have one writer.
 *
 * The tick timer keeps firing at `tickInterval` cadence whether or not the
 * simulation is playing; a paused tick does no work. Each tick rearms with
 * the interval current at that moment, so a speed change applies from the
 * next tick on.
 *
 * The timer is injectable for testing. No React, no Ink.
 */

import type { Settings } from "../config/index";
import { Button, type PointerEvent } from "../input/mouse";
import {
  gridSizeFor,
  gridToScreen,
  isUsableSize,
  screenToGrid,
  surfaceSizeFor,
} from "../input/mapping";
import { Grid } from "../life/grid";
import type { CellPoint, CellState } from "../life/types";
import { drawHints, drawStatus } from "../screen/status";
import type { DisplaySurface } from "../screen/types";

import { createSessionStore, type SessionStoreApi } from "./index";

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type ControllerAction =
  | { type: "toggle_play" }
  | { type: "speed_up" }
  | { type: "slow_down" }
  | { type: "toggle_cell"; x: number; y: number }
  | { type: "resize"; columns: number; rows: number }
  | { type: "tick" }
  | { type: "quit" };

// ---------------------------------------------------------------------------
// Tick timer
// ---------------------------------------------------------------------------

/** One-shot timer owning at most one pending callback. */
export interface TickTimer {
  arm(callback: () => void, delayMs: number): void;
  cancel(): void;
}

export function createTimeoutTimer(): TickTimer {
  let handle: ReturnType<typeof setTimeout> | null = null;
  return {
    arm(callback, delayMs) {
      if (handle !== null) clearTimeout(handle);
      handle = setTimeout(() => {
        handle = null;
        callback();
      }, delayMs);
    },
    cancel() {
      if (handle !== null) {
        clearTimeout(handle);
        handle = null;
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export type ControllerSettings = Pick<
  Settings,
  "tickIntervalMs" | "intervalStepMs" | "statusWidth" | "aliveGlyph" | "deadGlyph"
>;

export interface ControllerOptions {
  /** Drawable area: the terminal minus its reserved bottom row. */
  surface: DisplaySurface;
  settings: ControllerSettings;
  /** Seed grid; defaults to an empty grid sized to the surface. */
  grid?: Grid;
  timer?: TickTimer;
}

export class SessionController {
  readonly store: SessionStoreApi;

  private _grid: Grid;
  private _surface: DisplaySurface;
  private _settings: ControllerSettings;
  private _timer: TickTimer;
  private _started = false;

  constructor(opts: ControllerOptions) {
    this._surface = opts.surface;
    this._settings = opts.settings;
    this._timer = opts.timer ?? createTimeoutTimer();

    const size = gridSizeFor(opts.surface, opts.settings.statusWidth);
    if (!isUsableSize(size)) {
      throw new RangeError(
        `Surface ${opts.surface.columns}x${opts.surface.rows} is too small for a ` +
          `${opts.settings.statusWidth}-column status panel`,
      );
    }
    this._grid = opts.grid ?? new Grid(size.width, size.height);

    this.store = createSessionStore({
      width: this._grid.width,
      height: this._grid.height,
      generation: this._grid.generation,
      running: false,
      tickInterval: Math.max(0, opts.settings.tickIntervalMs),
      quit: false,
    });
  }

  get grid(): Grid {
    return this._grid;
  }

  get isStarted(): boolean {
    return this._started;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Paint everything and start the tick activity. */
  start(): void {
    if (this._started || this.store.getState().quit) return;
    this._started = true;
    this._repaintAll();
    this._surface.show();
    this._arm();
  }

  /** Cancel the tick activity. The session can be started again. */
  stop(): void {
    this._timer.cancel();
    this._started = false;
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  /** The one serialized entry point for every state change. */
  dispatch(action: ControllerAction): void {
    const { dispatch, quit } = this.store.getState();
    if (quit) return;

    switch (action.type) {
      case "toggle_play": {
        dispatch({ type: "TOGGLE_RUNNING" });
        this._refreshStatus();
        return;
      }

      case "speed_up": {
        dispatch({ type: "ADJUST_INTERVAL", delta: -this._settings.intervalStepMs });
        this._refreshStatus();
        return;
      }

      case "slow_down": {
        dispatch({ type: "ADJUST_INTERVAL", delta: this._settings.intervalStepMs });
        this._refreshStatus();
        return;
      }

      case "toggle_cell": {
        const { x, y } = action;
        if (!this._grid.contains(x, y)) return;
        this._drawCell(x, y, this._grid.toggle(x, y));
        this._surface.show();
        return;
      }

      case "resize": {
        this._resize(action.columns, action.rows);
        return;
      }

      case "tick": {
        this._tick();
        return;
      }

      case "quit": {
        dispatch({ type: "QUIT" });
        this.stop();
        return;
      }
    }
  }

  /** Pointer entry point: a primary-button press on the grid toggles a cell. */
  pointer(event: PointerEvent): void {
    if (event.released || (event.buttons & Button.Primary) === 0) return;
    const { width, height } = this.store.getState();
    const cell = screenToGrid(event.x, event.y, {
      statusWidth: this._settings.statusWidth,
      width,
      height,
    });
    if (cell) this.dispatch({ type: "toggle_cell", x: cell.x, y: cell.y });
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private _tick(): void {
    const state = this.store.getState();
    if (state.running) {
      const changes = this._grid.step();
      for (const { x, y, state: cell } of changes) {
        this._drawCell(x, y, cell);
      }
      state.dispatch({ type: "SET_GENERATION", generation: this._grid.generation });
      drawStatus(this._surface, this.store.getState(), this._settings.statusWidth);
      this._surface.show();
    }
    if (this._started) this._arm();
  }

  /** `columns` x `rows` is the new terminal size. */
  private _resize(columns: number, rows: number): void {
    const area = surfaceSizeFor(columns, rows);
    const size = gridSizeFor(area, this._settings.statusWidth);
    if (!isUsableSize(size)) return;

    this.store.getState().dispatch({
      type: "SET_DIMENSIONS",
      width: size.width,
      height: size.height,
    });
    const live = this._grid.resize(size.width, size.height);
    this._surface.resize(area.columns, area.rows);
    this._repaintAll(live);
    this._surface.sync();
  }

  private _arm(): void {
    this._timer.arm(() => this.dispatch({ type: "tick" }), this.store.getState().tickInterval);
  }

  private _refreshStatus(): void {
    drawStatus(this._surface, this.store.getState(), this._settings.statusWidth);
    this._surface.show();
  }

  /** Clear the surface and draw the grid, status and hints from scratch. */
  private _repaintAll(live: CellPoint[] = this._grid.liveCells()): void {
    this._surface.clear();
    if (this._settings.deadGlyph !== " ") {
      for (let y = 0; y < this._grid.height; y++) {
        for (let x = 0; x < this._grid.width; x++) this._drawCell(x, y, 0);
      }
    }
    for (const { x, y } of live) {
      this._drawCell(x, y, 1);
    }
    drawStatus(this._surface, this.store.getState(), this._settings.statusWidth);
    drawHints(this._surface, this._settings.statusWidth);
  }

  private _drawCell(x: number, y: number, state: CellState): void {
    const pos = gridToScreen(x, y, this._settings.statusWidth);
    if (state === 1) {
      this._surface.setCell(pos.x, pos.y, this._settings.aliveGlyph, "alive");
    } else {
      this._surface.setCell(pos.x, pos.y, this._settings.deadGlyph, "dead");
    }
  }
}
