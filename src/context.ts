import type { CommandRunner } from './backend/runner'
import type { ShellHost } from './host'
import type { Session } from './session/session-manager'
import type { Selector } from './search/selector'
import type { VellumShellConfig } from './types'
import process from 'node:process'
import { BackingProcess } from './backend/backing-process'
import { CursorStateMachine } from './cursor/cursor-state-machine'
import { Logger } from './logger'
import { SearchBridge } from './search/search-bridge'
import { FzfSelector } from './search/selector'
import { SESSION_START_VARIABLE, SESSION_VARIABLE, SessionManager } from './session/session-manager'

/**
 * Everything one interactive shell's integration knows. One per shell, handed
 * to every hook and widget; never shared between shells.
 */
export interface IntegrationContext {
  readonly config: VellumShellConfig
  readonly log: Logger
  readonly backend: BackingProcess
  readonly cursor: CursorStateMachine
  readonly searchBridge: SearchBridge
  readonly sessions: SessionManager
  host?: ShellHost
  session?: Session
  /** Id of the last entry picked through search */
  lastSelectedId?: string
  initialized: boolean
}

export interface ContextOptions {
  config: VellumShellConfig
  runner?: CommandRunner
  selector?: Selector
  log?: Logger
}

export function createContext(options: ContextOptions): IntegrationContext {
  const { config } = options
  const log = options.log ?? new Logger({ verbose: config.verbose, logging: config.logging, scope: 'vellum' })

  // Late bound: backend calls read the host and session as they are at call time
  let context: IntegrationContext | undefined
  const environment = (): NodeJS.ProcessEnv => {
    const env: NodeJS.ProcessEnv = { ...(context?.host?.environment() ?? process.env) }
    if (context?.session) {
      env[SESSION_VARIABLE] = context.session.token
      if (context.session.start)
        env[SESSION_START_VARIABLE] = context.session.start
    }
    if (config.editor)
      env.VELLUM_EDITOR = config.editor
    return env
  }

  const backend = new BackingProcess({ config: config.backend, runner: options.runner, environment })
  const selector = options.selector ?? new FzfSelector({ search: config.search, runner: options.runner, environment })

  context = {
    config,
    log,
    backend,
    cursor: new CursorStateMachine({
      backend,
      session: () => context?.session?.token ?? '',
      extraArgs: config.navigation.moveArgs,
      log: log.withScope('cursor'),
    }),
    searchBridge: new SearchBridge({
      history: backend,
      selector,
      search: config.search,
      log: log.withScope('search'),
    }),
    sessions: new SessionManager({
      backend,
      recordStart: config.session.recordStart,
      log: log.withScope('session'),
    }),
    initialized: false,
  }

  return context
}
