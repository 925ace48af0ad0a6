/**
 * Zustand store for session state.
 *
 * The reducer already uses Immer's produce() for immutable updates,
 * so the store itself does not need the immer middleware.
 *
 * One vanilla store is created per session. Ink components read it with
 * zustand's `useStore(store, selector)`; the controller dispatches into it.
 */

import { createStore } from "zustand/vanilla";

import { reduce } from "./reducer";
import type { SessionIntent, SessionState, SessionStore } from "./types";

export function createSessionStore(initial: SessionState) {
  return createStore<SessionStore>()((set, get) => ({
    ...initial,

    dispatch: (intent: SessionIntent) => {
      const { dispatch: _, ...currentState } = get();
      const nextState = reduce(currentState, intent);
      set(nextState);
    },
  }));
}

export type SessionStoreApi = ReturnType<typeof createSessionStore>;

// Re-export types for convenience
export type { SessionIntent, SessionState, SessionStore } from "./types";
