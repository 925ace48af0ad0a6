/**
 * Pure reducer for session intents.
 *
 * Uses Immer's produce() so handlers can write mutating syntax
 * while producing immutable snapshots.
 */

import { produce } from "immer";

import type { SessionIntent, SessionState } from "./types";
import { MIN_TICK_INTERVAL_MS } from "./types";

export function reduce(state: SessionState, intent: SessionIntent): SessionState {
  return produce(state, (draft) => {
    if (draft.quit) return;

    switch (intent.type) {
      case "TOGGLE_RUNNING": {
        draft.running = !draft.running;
        return;
      }

      case "ADJUST_INTERVAL": {
        draft.tickInterval = Math.max(
          MIN_TICK_INTERVAL_MS,
          draft.tickInterval + intent.delta,
        );
        return;
      }

      case "SET_DIMENSIONS": {
        const { width, height } = intent;
        if (width < 1 || height < 1) return;
        draft.running = false;
        draft.width = width;
        draft.height = height;
        return;
      }

      case "SET_GENERATION": {
        // Generations only move forward.
        if (intent.generation > draft.generation) {
          draft.generation = intent.generation;
        }
        return;
      }

      case "QUIT": {
        draft.quit = true;
        draft.running = false;
        return;
      }
    }
  });
}
