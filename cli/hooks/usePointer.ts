/**
 * Mouse input for the simulator.
 *
 * Ink has no mouse support of its own, but once reporting is switched on
 * (see cli/lib/terminal.ts) the terminal's SGR reports arrive through the
 * same input stream as keys. This hook decodes them and hands each pointer
 * event to the callback.
 */

import { useInput } from "ink";

import { parseMouseReports, type PointerEvent } from "../../lib/input/mouse.js";

export function usePointer(onPointer: (event: PointerEvent) => void): void {
  useInput((input: string) => {
    for (const event of parseMouseReports(input)) {
      onPointer(event);
    }
  });
}
