/**
 * Complete keyboard binding map for the simulator.
 *
 * Space toggles play/pause. The arrow keys change the tick interval: left
 * shortens it (faster), right lengthens it (slower). q, Q, Escape and Enter
 * all quit.
 */

import type { KeyBinding } from './types'

/**
 * All keyboard bindings in the application
 */
export const BINDINGS: KeyBinding[] = [
  {
    key: ' ',
    description: 'Play',
    action: 'toggle_play',
  },
  {
    key: 'leftArrow',
    description: 'Faster',
    action: 'speed_up',
  },
  {
    key: '+',
    description: 'Faster',
    action: 'speed_up',
    hidden: true, // Same as leftArrow
  },
  {
    key: 'rightArrow',
    description: 'Slower',
    action: 'slow_down',
  },
  {
    key: '-',
    description: 'Slower',
    action: 'slow_down',
    hidden: true, // Same as rightArrow
  },
  {
    key: 'q',
    description: 'Quit',
    action: 'quit',
  },
  {
    key: 'Q',
    description: 'Quit',
    action: 'quit',
    hidden: true,
  },
  {
    key: 'escape',
    description: 'Quit',
    action: 'quit',
    hidden: true,
  },
  {
    key: 'return',
    description: 'Quit',
    action: 'quit',
    hidden: true,
  },
]

/**
 * Find the binding for a canonical key name
 */
export function findBinding(key: string): KeyBinding | undefined {
  return BINDINGS.find((binding) => binding.key === key)
}

const KEY_LABELS: Record<string, string> = {
  leftArrow: '←',
  rightArrow: '→',
  return: 'Enter',
  escape: 'Esc',
  ' ': 'Spc',
}

/**
 * Hints for the status panel (non-hidden bindings only)
 */
export function getHints(): Array<{ key: string; description: string }> {
  return BINDINGS.filter((binding) => !binding.hidden).map((binding) => ({
    key: KEY_LABELS[binding.key] ?? binding.key,
    description: binding.description,
  }))
}
