import type { DialectAdapter, IntegrationOperations, Requirement } from './adapters'
import type { CommandRunner } from './backend/runner'
import type { IntegrationContext } from './context'
import type { LineBuffer, ShellHost } from './host'
import type { Logger } from './logger'
import type { Direction } from './protocol/codec'
import type { Selector } from './search/selector'
import type { VellumShellConfig } from './types'
import { getAdapter, installAdapter, missingRequirements, requirementMessage } from './adapters'
import { defaultConfig } from './defaults'
import { createContext } from './context'

// Shell variable marking a shell the integration already set up; not exported
export const SETUP_SENTINEL = '__VELLUM_SETUP'

export type InitStatus = 'initialized' | 'already-initialized' | 'non-interactive' | 'missing-dependency'

export interface InitResult {
  status: InitStatus
  missing?: Requirement[]
}

export interface ShellIntegrationOptions {
  config?: VellumShellConfig
  runner?: CommandRunner
  selector?: Selector
  log?: Logger
}

/**
 * The integration for one interactive shell: session setup, command capture,
 * prompt reset, arrow-key navigation and search. Nothing it does from a hook
 * or widget can throw into the shell.
 */
export class ShellIntegration implements IntegrationOperations {
  readonly context: IntegrationContext

  constructor(options: ShellIntegrationOptions = {}) {
    this.context = createContext({
      config: options.config ?? defaultConfig,
      runner: options.runner,
      selector: options.selector,
      log: options.log,
    })
  }

  /**
   * Set the integration up in a shell, once. A second call, or a shell that
   * already carries the sentinel, does nothing at all.
   */
  async initialize(host: ShellHost, adapter: DialectAdapter = getAdapter(host.dialect)): Promise<InitResult> {
    const ctx = this.context

    if (ctx.initialized || host.getVariable(SETUP_SENTINEL)) {
      return { status: 'already-initialized' }
    }
    if (!host.interactive) {
      return { status: 'non-interactive' }
    }

    const missing = missingRequirements(adapter, host)
    if (missing.length > 0) {
      const [first] = missing
      host.writeError(requirementMessage(first))
      return { status: 'missing-dependency', missing }
    }

    // Claimed before the first await so overlapping calls cannot both proceed
    ctx.initialized = true
    ctx.host = host

    try {
      ctx.session = await ctx.sessions.establish({
        getEnv: name => host.environment()[name],
        exportEnv: (name, value) => host.setVariable(name, value, { exported: true }),
      })
    }
    catch (error) {
      ctx.initialized = false
      ctx.host = undefined
      const reason = error instanceof Error ? error.message : String(error)
      host.writeError(`${ctx.backend.command} is unavailable: ${reason}`)
      return { status: 'missing-dependency' }
    }

    host.setVariable(SETUP_SENTINEL, '1', { readonly: true })
    ctx.cursor.reset()
    installAdapter(adapter, host, this)
    ctx.log.debug(`initialized ${adapter.name} integration for session ${ctx.session.token}`)

    return { status: 'initialized' }
  }

  // Best effort: losing one entry must never hold up the prompt
  async capture(commandLine: string): Promise<void> {
    try {
      const result = await this.context.backend.store(commandLine)
      if (result.exitCode !== 0) {
        this.context.log.debug(`store exited with ${result.exitCode}`)
      }
    }
    catch (error) {
      this.context.log.debug('store failed:', error)
    }
  }

  reset(): void {
    this.context.cursor.reset()
  }

  /**
   * Arrow-key widget. A multi-line buffer gets plain line movement and the
   * history is left alone.
   */
  async navigate(direction: Direction, buffer: LineBuffer): Promise<number> {
    if (buffer.text.includes('\n')) {
      buffer.moveLine(direction)
      return 0
    }

    const result = await this.context.cursor.step(direction, buffer.text)
    if (!result.moved) {
      return 1
    }
    buffer.replace(result.line)
    return 0
  }

  async search(buffer: LineBuffer): Promise<number> {
    const outcome = await this.context.searchBridge.run(buffer, this.context)
    return outcome.status
  }
}
