import type { Direction } from './protocol/codec'
import type { DialectName } from './types'

/**
 * The edit buffer of the host's line editor, as seen by a widget.
 */
export interface LineBuffer {
  readonly text: string
  /** Replace the whole buffer and put the point at its end */
  replace: (text: string) => void
  /** Plain cursor movement one line up (-1) or down (1) within the buffer */
  moveLine: (direction: Direction) => void
}

/**
 * Widgets return a status the way shell widgets do: 0 when the key did its
 * job, non-zero otherwise. The host redraws either way.
 */
export type Widget = (buffer: LineBuffer) => Promise<number>

export type HookCallback = (commandLine: string) => Promise<void> | void

export interface SetVariableOptions {
  exported?: boolean
  readonly?: boolean
}

/**
 * What an interactive shell offers an integration: variables, the exported
 * environment, hook lists, key bindings and an error stream. Each dialect
 * adapter speaks to it in the dialect's own hook and key names.
 */
export interface ShellHost {
  readonly dialect: DialectName
  readonly interactive: boolean
  getVariable: (name: string) => string | undefined
  setVariable: (name: string, value: string, options?: SetVariableOptions) => void
  /** The environment child processes inherit */
  environment: () => NodeJS.ProcessEnv
  hasCommand: (name: string) => boolean
  hasFunction: (name: string) => boolean
  /**
   * Append a named callback to a native hook list. Pre-execution hooks
   * receive the command line; prompt hooks receive an empty string.
   */
  addHook: (nativeHook: string, name: string, callback: HookCallback) => void
  bindKey: (nativeKey: string, widget: Widget) => void
  writeError: (line: string) => void
}
