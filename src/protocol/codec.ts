import type { RecordDelimiter } from '../types'

export type Direction = -1 | 1

export interface NavigationRequest {
  direction: Direction
  session: string
  /** Entry id of the last shown entry; empty when a sequence starts */
  cursor: string
  /** Only sent on the first request of a sequence */
  prefix?: string
  extraArgs: readonly string[]
}

export type MoveReply =
  | { kind: 'ok', entryId: string, line: string }
  | { kind: 'malformed', raw: string }

export interface SearchSelection {
  entryId: string
  line: string
}

export interface HistoryListing {
  sessionOnly?: boolean
  extraArgs?: readonly string[]
}

const MOVE_DELIMITER = '|'
const SELECTION_DELIMITER = '\t'

// Leading words of the `store` and `move` calls, ahead of their operands
export const STORE_COMMAND = ['store', '--'] as const
export const MOVE_COMMAND = ['move', '--with-id', '--session'] as const

export function encodeInit(what: 'session' | 'timestamp'): string[] {
  return ['init', what]
}

export function encodeStore(commandLine: string): string[] {
  return [...STORE_COMMAND, commandLine]
}

// The session travels in the environment; `--session` only scopes the lookup to it.
export function encodeMove(request: NavigationRequest): string[] {
  const args: string[] = [...MOVE_COMMAND]
  if (request.prefix !== undefined) {
    args.push(`--prefix=${request.prefix}`)
  }
  args.push(...request.extraArgs, '--', String(request.direction), request.cursor)
  return args
}

export function encodeHistory(listing: HistoryListing = {}): string[] {
  const args = ['history', '--fzf']
  if (listing.sessionOnly) {
    args.push('--session')
  }
  args.push(...(listing.extraArgs ?? []))
  return args
}

/**
 * Trailing newlines are not part of a reply, the same way command
 * substitution drops them.
 */
export function stripTrailingNewlines(raw: string): string {
  return raw.replace(/\n+$/, '')
}

/**
 * Decode `<entry_id>|<line>`. Only the first `|` separates; the line may hold
 * more. An empty id (delimiter at position 0) is kept as is.
 */
export function decodeMove(raw: string): MoveReply {
  const reply = stripTrailingNewlines(raw)
  const at = reply.indexOf(MOVE_DELIMITER)
  if (at < 0) {
    return { kind: 'malformed', raw }
  }
  return {
    kind: 'ok',
    entryId: reply.slice(0, at),
    line: reply.slice(at + MOVE_DELIMITER.length),
  }
}

/**
 * Decode the selector's output `<entry_id>\t<line>`. Empty output means
 * nothing was selected.
 */
export function decodeSelection(raw: string): SearchSelection | undefined {
  const selected = raw.endsWith('\n') ? raw.slice(0, -1) : raw
  if (!selected) {
    return undefined
  }
  const at = selected.indexOf(SELECTION_DELIMITER)
  if (at < 0) {
    return { entryId: '', line: selected }
  }
  return {
    entryId: selected.slice(0, at),
    line: selected.slice(at + SELECTION_DELIMITER.length),
  }
}

export function recordSeparator(delimiter: RecordDelimiter): string {
  return delimiter === 'nul' ? '\0' : '\n'
}

/**
 * Split a whitespace separated argument list as found in `VELLUM_MOVE_ARGS`
 * or `VELLUM_HISTORY_ARGS`. Single and double quotes group words.
 */
export function splitArgs(value: string): string[] {
  const parts: string[] = []
  let current = ''
  let started = false
  let quoteChar = ''

  for (const char of value) {
    if (quoteChar) {
      if (char === quoteChar) {
        quoteChar = ''
      }
      else {
        current += char
      }
    }
    else if (char === '"' || char === '\'') {
      quoteChar = char
      started = true
    }
    else if (/\s/.test(char)) {
      if (started) {
        parts.push(current)
        current = ''
        started = false
      }
    }
    else {
      current += char
      started = true
    }
  }

  if (started) {
    parts.push(current)
  }

  return parts
}
