export type DialectName = 'bash' | 'zsh' | 'fish' | 'readline'

export interface VellumShellConfig {
  verbose: boolean
  /**
   * Dialect `init` writes a setup script for and `doctor` checks, when
   * neither names one. When unset, it is detected from `$SHELL`. The
   * built-in shell always runs the readline dialect.
   */
  dialect?: DialectName
  backend: BackendConfig
  session: SessionConfig
  navigation: NavigationConfig
  search: SearchConfig
  /**
   * Editor override handed to the backing process as `VELLUM_EDITOR`
   * (used by its edit/delete commands).
   */
  editor?: string
  logging?: LoggingConfig
}

export interface BackendConfig {
  /** Name or path of the backing binary */
  command: string
  /** Extra environment for every backing call */
  env?: Record<string, string>
}

export interface SessionConfig {
  /** Request and export `VELLUM_SESSION_START` alongside the session token */
  recordStart: boolean
}

export interface NavigationConfig {
  /** Extra arguments for every `move` call, e.g. `--no-duplicates` */
  moveArgs: string[]
}

export type RecordDelimiter = 'nul' | 'newline'

export interface SearchConfig {
  /** Extra arguments for `history --fzf` */
  historyArgs: string[]
  /** Restrict search to commands of the current session */
  sessionOnly: boolean
  /** How `history --fzf` separates its records */
  delimiter: RecordDelimiter
  selector: SelectorConfig
}

export interface SelectorConfig {
  command: string
  /** Option overrides appended to the built-in selector options */
  options: string[]
}

export interface LoggingConfig {
  timestamps?: boolean
  prefixes?: {
    debug?: string
    info?: string
    warn?: string
    error?: string
  }
}

export interface ConfigValidation {
  valid: boolean
  errors: string[]
  warnings: string[]
}

/**
 * Hook handler result. Handlers never throw into the shell; failures are
 * reported through `success: false`.
 */
export interface HookResult {
  success: boolean
  name?: string
  error?: string
}

export type HookHandler<T = unknown> = (data: T) => Promise<void> | void

export interface CommandAfterData {
  command: string
  exitCode: number
}
