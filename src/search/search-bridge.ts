import type { LineBuffer } from '../host'
import type { Logger } from '../logger'
import type { HistoryListing, SearchSelection } from '../protocol/codec'
import type { SearchConfig } from '../types'
import type { Selector } from './selector'
import { decodeSelection, recordSeparator } from '../protocol/codec'

export interface HistorySource {
  listHistory: (listing: HistoryListing) => Promise<string>
}

/**
 * The part of the session context a search writes back into.
 */
export interface SearchTarget {
  lastSelectedId?: string
  cursor: { reset: () => void }
}

export interface SearchOutcome {
  status: number
  selection?: SearchSelection
}

// Status used when the selector cannot be started, as a shell reports a missing command
export const SELECTOR_UNAVAILABLE = 127

export interface SearchBridgeOptions {
  history: HistorySource
  selector: Selector
  search: SearchConfig
  log?: Logger
}

export class SearchBridge {
  private history: HistorySource
  private selector: Selector
  private search: SearchConfig
  private log?: Logger

  constructor(options: SearchBridgeOptions) {
    this.history = options.history
    this.selector = options.selector
    this.search = options.search
    this.log = options.log
  }

  /**
   * Pipe the history listing through the selector, seeded with the buffer
   * text. A selection replaces the buffer; a cancelled or failed search
   * leaves buffer and target exactly as they were.
   */
  async run(buffer: LineBuffer, target: SearchTarget): Promise<SearchOutcome> {
    let records: string
    try {
      records = await this.history.listHistory({
        sessionOnly: this.search.sessionOnly,
        extraArgs: this.search.historyArgs,
      })
    }
    catch (error) {
      this.log?.debug('history listing failed:', error)
      return { status: 1 }
    }
    this.log?.debug(`${records.split(recordSeparator(this.search.delimiter)).filter(Boolean).length} records to search`)

    let exitCode: number
    let output: string
    try {
      ({ exitCode, output } = await this.selector.select({ records, query: buffer.text }))
    }
    catch (error) {
      this.log?.debug(`${this.selector.command} could not be started:`, error)
      return { status: SELECTOR_UNAVAILABLE }
    }

    const selection = decodeSelection(output)
    if (!selection) {
      return { status: exitCode }
    }

    target.lastSelectedId = selection.entryId
    target.cursor.reset()
    buffer.replace(selection.line)
    return { status: exitCode, selection }
  }
}
