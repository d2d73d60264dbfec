import type { LineBuffer } from '../host'
import type { Direction } from '../protocol/codec'
import type { DialectName } from '../types'

export interface Requirement {
  kind: 'command' | 'function' | 'variable'
  name: string
  /** What the user is told is missing */
  label: string
  url: string
}

/**
 * A dialect described as data: which native hooks and keys carry the four
 * operations, and what must be present for them to work.
 */
export interface DialectAdapter {
  readonly name: DialectName
  readonly requirements: readonly Requirement[]
  readonly hooks: {
    readonly capture: string
    readonly reset: string
  }
  readonly keys: {
    readonly previous: readonly string[]
    readonly next: readonly string[]
    readonly search: readonly string[]
  }
}

export interface IntegrationOperations {
  capture: (commandLine: string) => Promise<void>
  reset: () => void
  navigate: (direction: Direction, buffer: LineBuffer) => Promise<number>
  search: (buffer: LineBuffer) => Promise<number>
}
