/**
 * Keyboard binding types and interfaces for the simulator.
 */

/**
 * Control actions a key can trigger. The names match the session
 * controller's payload-free actions.
 */
export type ControlAction = 'toggle_play' | 'speed_up' | 'slow_down' | 'quit'

/**
 * A single keyboard binding definition
 *
 * Bindings are pure data - they describe WHAT keys do, not HOW.
 * The action handlers are connected separately in the App component.
 */
export interface KeyBinding {
  /** The key character or name ('q', 'leftArrow', ' ', etc.) */
  key: string

  /** Short description for the status panel (fits in its width) */
  description: string

  /** Action identifier */
  action: ControlAction

  /** Don't show in the status panel hints */
  hidden?: boolean
}

/**
 * The flags of Ink's useInput key object that the bindings read
 */
export interface InkKeyInput {
  leftArrow: boolean
  rightArrow: boolean
  return: boolean
  escape: boolean
}
