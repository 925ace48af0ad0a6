/**
 * Root application component for the simulator's terminal UI.
 *
 * Owns one ScreenBuffer and one SessionController for the lifetime of the
 * mount and wires Ink's input sources to controller actions.
 *
 * Data flow:
 *   Keys / mouse / resize -> controller.dispatch (serialized)
 *   Tick timer            -> controller.dispatch (serialized)
 *   Controller            -> ScreenBuffer (cell writes + flush) -> ScreenView
 *   Controller            -> session store (quit)                -> app.exit()
 */

import React, { useEffect, useRef } from "react";
import { useApp } from "ink";
import { useStore } from "zustand";

import type { Settings } from "../lib/config/index.js";
import { surfaceSizeFor } from "../lib/input/mapping.js";
import { ScreenBuffer } from "../lib/screen/buffer.js";
import { SessionController, type TickTimer } from "../lib/session/controller.js";

import { ScreenView } from "./components/ScreenView.js";
import { useKeyBindings } from "./hooks/useKeyBindings.js";
import { usePointer } from "./hooks/usePointer.js";
import { useTerminalSize } from "./hooks/useTerminalSize.js";

export interface AppProps {
  settings: Settings;
  /** Terminal size at startup. */
  columns: number;
  rows: number;
  /** Injected by tests. */
  timer?: TickTimer;
}

interface Session {
  buffer: ScreenBuffer;
  controller: SessionController;
}

export function App({ settings, columns, rows, timer }: AppProps) {
  const app = useApp();

  // Lazy session creation (persists across re-renders).
  const sessionRef = useRef<Session | null>(null);
  if (sessionRef.current === null) {
    // The last terminal row stays out of the frame.
    const area = surfaceSizeFor(columns, rows);
    const buffer = new ScreenBuffer(area.columns, area.rows);
    sessionRef.current = {
      buffer,
      controller: new SessionController({ surface: buffer, settings, timer }),
    };
  }
  const { buffer, controller } = sessionRef.current;

  // -- Tick activity --------------------------------------------------------

  useEffect(() => {
    controller.start();
    return () => {
      controller.stop();
    };
  }, [controller]);

  // -- Quit -----------------------------------------------------------------

  const quit = useStore(controller.store, (s) => s.quit);

  useEffect(() => {
    if (quit) app.exit();
  }, [quit, app]);

  // -- Input ----------------------------------------------------------------

  useKeyBindings({
    toggle_play: () => controller.dispatch({ type: "toggle_play" }),
    speed_up: () => controller.dispatch({ type: "speed_up" }),
    slow_down: () => controller.dispatch({ type: "slow_down" }),
    quit: () => controller.dispatch({ type: "quit" }),
  });

  usePointer((event) => controller.pointer(event));

  useTerminalSize((newColumns, newRows) =>
    controller.dispatch({ type: "resize", columns: newColumns, rows: newRows }),
  );

  return <ScreenView buffer={buffer} palette={{ alive: settings.aliveColor }} />;
}
