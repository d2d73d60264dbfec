import type { CommandRunner } from '../backend/runner'
import type { SearchConfig } from '../types'
import process from 'node:process'
import { spawnRunner } from '../backend/runner'

export interface SelectorRequest {
  /** Delimited records, each `<id>\t<line>` */
  records: string
  /** Initial query, the text currently in the buffer */
  query: string
}

export interface SelectorResult {
  exitCode: number
  output: string
}

/**
 * An external interactive filter. `select` resolves with whatever the user
 * picked, or rejects when the selector cannot be started.
 */
export interface Selector {
  readonly command: string
  select: (request: SelectorRequest) => Promise<SelectorResult>
}

// Base options every fzf invocation starts from, ahead of the user's defaults
export const FZF_BASE_OPTIONS = ['--height', '40%', '--min-height', '20+', '--bind=ctrl-z:ignore']

export const FZF_HISTORY_OPTIONS = [
  '-n2..,..',
  '--scheme=history',
  '--bind=ctrl-r:toggle-sort',
  '--wrap-sign', '\'\t↳ \'',
  '--highlight-line',
]

/**
 * Compose `FZF_DEFAULT_OPTS` for a history search: base options, the user's
 * own defaults, history options, configured overrides, `FZF_CTRL_R_OPTS`,
 * then single selection and the record delimiter.
 */
export function buildSelectorOptions(search: SearchConfig, env: NodeJS.ProcessEnv = process.env): string {
  const parts: string[] = [...FZF_BASE_OPTIONS]
  if (env.FZF_DEFAULT_OPTS)
    parts.push(env.FZF_DEFAULT_OPTS)
  parts.push(...FZF_HISTORY_OPTIONS, ...search.selector.options)
  if (env.FZF_CTRL_R_OPTS)
    parts.push(env.FZF_CTRL_R_OPTS)
  parts.push('+m')
  if (search.delimiter === 'nul')
    parts.push('--read0')
  return parts.join(' ')
}

export interface FzfSelectorOptions {
  search: SearchConfig
  runner?: CommandRunner
  environment?: () => NodeJS.ProcessEnv
}

export class FzfSelector implements Selector {
  private search: SearchConfig
  private runner: CommandRunner
  private environment: () => NodeJS.ProcessEnv

  constructor(options: FzfSelectorOptions) {
    this.search = options.search
    this.runner = options.runner ?? spawnRunner
    this.environment = options.environment ?? (() => process.env)
  }

  get command(): string {
    return this.search.selector.command
  }

  async select(request: SelectorRequest): Promise<SelectorResult> {
    const base = this.environment()
    const env = {
      ...base,
      FZF_DEFAULT_OPTS: buildSelectorOptions(this.search, base),
      FZF_DEFAULT_OPTS_FILE: '',
    }
    // fzf draws on the terminal itself; only the selection comes back on stdout
    const result = await this.runner(this.command, ['--query', request.query], {
      input: request.records,
      env,
      stderr: 'inherit',
    })
    return { exitCode: result.exitCode, output: result.stdout }
  }
}
