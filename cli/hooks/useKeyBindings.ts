/**
 * Keyboard handler for the simulator.
 *
 * Bridges Ink's `useInput` hook with the declarative binding map from
 * `lib/keys/bindings.ts`. Callers pass a handler map keyed by action
 * name; this hook takes care of matching the physical keypress to the
 * right action.
 */

import { useInput } from "ink";

import { isMouseReport } from "../../lib/input/mouse.js";
import { findBinding } from "../../lib/keys/bindings.js";
import type { ControlAction, InkKeyInput } from "../../lib/keys/types.js";

// ---------------------------------------------------------------------------
// Key name resolution
// ---------------------------------------------------------------------------

/**
 * Derive the canonical key name that our binding map uses from Ink's input
 * callback arguments.
 *
 * Ink delivers special keys via boolean flags on the `key` object and
 * printable characters via the `input` string.
 */
export function resolveKeyName(input: string, key: InkKeyInput): string {
  if (key.leftArrow) return "leftArrow";
  if (key.rightArrow) return "rightArrow";
  if (key.return) return "return";
  if (key.escape) return "escape";

  // Printable character (or space)
  return input;
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

/**
 * Register keyboard handlers.
 *
 * @param handlers - Map of action name to callback. Only actions with a
 *                   matching handler are invoked; unhandled actions are
 *                   ignored.
 */
export function useKeyBindings(
  handlers: Partial<Record<ControlAction, () => void>>,
): void {
  useInput((input: string, key: InkKeyInput) => {
    // Mouse reports share the input stream; usePointer handles them.
    if (isMouseReport(input)) return;

    const keyName = resolveKeyName(input, key);
    if (!keyName) return;

    const binding = findBinding(keyName);
    if (!binding) return;

    const handler = handlers[binding.action];
    if (handler) {
      handler();
    }
  });
}
