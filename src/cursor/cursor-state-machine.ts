import type { Logger } from '../logger'
import type { Direction, MoveReply, NavigationRequest } from '../protocol/codec'

export type CursorState =
  | { kind: 'idle' }
  /** `entryId` is never empty */
  | { kind: 'navigating', entryId: string }

export interface NavigationBackend {
  move: (request: NavigationRequest) => Promise<MoveReply>
}

export interface CursorStateMachineOptions {
  backend: NavigationBackend
  /** Current session token, read on every step */
  session: () => string
  /** Extra `move` arguments, e.g. `--no-duplicates` */
  extraArgs?: readonly string[]
  log?: Logger
}

export type StepResult =
  | { moved: true, line: string, entryId: string }
  | { moved: false, reason: 'malformed' | 'failed' }

const IDLE: CursorState = { kind: 'idle' }

// Navigation through the backing store, one entry per step.
// Pure apart from the backend call: no TTY or rendering concerns.
export class CursorStateMachine {
  private state: CursorState = IDLE
  private backend: NavigationBackend
  private session: () => string
  private extraArgs: readonly string[]
  private log?: Logger

  constructor(options: CursorStateMachineOptions) {
    this.backend = options.backend
    this.session = options.session
    this.extraArgs = options.extraArgs ?? []
    this.log = options.log
  }

  current(): CursorState {
    return this.state
  }

  reset(): void {
    this.state = IDLE
  }

  /**
   * Build the request for the next step. A fresh sequence carries the
   * buffer as prefix; later steps resume from the last shown entry instead,
   * whatever the buffer holds by then.
   */
  request(direction: Direction, bufferText: string): NavigationRequest {
    if (this.state.kind === 'idle') {
      return {
        direction,
        session: this.session(),
        cursor: '',
        prefix: bufferText,
        extraArgs: this.extraArgs,
      }
    }
    return {
      direction,
      session: this.session(),
      cursor: this.state.entryId,
      extraArgs: this.extraArgs,
    }
  }

  /**
   * Move one entry older (-1) or newer (1). On any failure the state stays
   * where it was and nothing is returned for the buffer.
   */
  async step(direction: Direction, bufferText: string): Promise<StepResult> {
    const request = this.request(direction, bufferText)

    let reply: MoveReply
    try {
      reply = await this.backend.move(request)
    }
    catch (error) {
      this.log?.debug('move failed:', error)
      return { moved: false, reason: 'failed' }
    }

    if (reply.kind === 'malformed') {
      this.log?.debug(`move returned a malformed reply: ${JSON.stringify(reply.raw)}`)
      return { moved: false, reason: 'malformed' }
    }

    // An empty id names no entry to resume from, so the next step starts over
    this.state = reply.entryId === '' ? IDLE : { kind: 'navigating', entryId: reply.entryId }
    return { moved: true, line: reply.line, entryId: reply.entryId }
  }
}
