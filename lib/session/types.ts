/**
 * Session state types and the Intent discriminated union.
 *
 * SessionState is owned by one store per running simulation. Every change
 * goes through an intent so the controller stays the single writer.
 */

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface SessionState {
  /** Visible simulation columns (terminal columns minus the status panel). */
  width: number;
  /** Visible simulation rows. */
  height: number;
  /** Completed generations; only ever grows. */
  generation: number;
  /** Play/pause flag. */
  running: boolean;
  /** Delay between ticks in milliseconds. Never negative. */
  tickInterval: number;
  /** Termination signal shared by the input and tick activities. */
  quit: boolean;
}

// ---------------------------------------------------------------------------
// Intent types (discriminated union)
// ---------------------------------------------------------------------------

export interface ToggleRunningIntent {
  type: "TOGGLE_RUNNING";
}

export interface AdjustIntervalIntent {
  type: "ADJUST_INTERVAL";
  /** Milliseconds to add; negative speeds the simulation up. */
  delta: number;
}

/** New grid dimensions. Also pauses: the grid is never stepped mid-resize. */
export interface SetDimensionsIntent {
  type: "SET_DIMENSIONS";
  width: number;
  height: number;
}

export interface SetGenerationIntent {
  type: "SET_GENERATION";
  generation: number;
}

export interface QuitIntent {
  type: "QUIT";
}

export type SessionIntent =
  | ToggleRunningIntent
  | AdjustIntervalIntent
  | SetDimensionsIntent
  | SetGenerationIntent
  | QuitIntent;

// ---------------------------------------------------------------------------
// Zustand store shape (state + actions)
// ---------------------------------------------------------------------------

export interface SessionStore extends SessionState {
  dispatch: (intent: SessionIntent) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MIN_TICK_INTERVAL_MS = 0;
