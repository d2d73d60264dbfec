import type { ConfigValidation, DialectName, VellumShellConfig } from './types'
import { homedir } from 'node:os'
import { resolve } from 'node:path'
import process from 'node:process'
import { loadConfig } from 'bunfig'
import { defaultConfig, mergeConfig } from './defaults'
import { splitArgs } from './protocol/codec'

const DIALECTS: readonly DialectName[] = ['bash', 'zsh', 'fish', 'readline']

export { defaultConfig, mergeConfig }

/**
 * Fold the environment variables the shell scripts of vellum have always
 * honoured into the config. Environment wins over files.
 */
export function applyEnvironment(cfg: VellumShellConfig, env: NodeJS.ProcessEnv = process.env): VellumShellConfig {
  const next = mergeConfig(cfg, {})

  if (env.VELLUM_MOVE_ARGS !== undefined)
    next.navigation.moveArgs = splitArgs(env.VELLUM_MOVE_ARGS)
  if (env.VELLUM_HISTORY_ARGS !== undefined)
    next.search.historyArgs = splitArgs(env.VELLUM_HISTORY_ARGS)
  if (env.VELLUM_EDITOR)
    next.editor = env.VELLUM_EDITOR

  return next
}

// Always fetches the latest config from disk.
// An explicit path (option or VELLUM_SHELL_CONFIG) wins over the bunfig search.
export async function loadVellumConfig(options?: { path?: string, env?: NodeJS.ProcessEnv }): Promise<VellumShellConfig> {
  const env = options?.env ?? process.env
  const explicitPath = options?.path || env.VELLUM_SHELL_CONFIG

  if (explicitPath) {
    const mod: { default?: Partial<VellumShellConfig> } = await import(resolvePath(explicitPath))
    return applyEnvironment(mergeConfig(defaultConfig, mod.default ?? {}), env)
  }

  const loaded = await loadConfig<VellumShellConfig>({
    name: 'vellum-shell',
    defaultConfig,
  })
  return applyEnvironment(mergeConfig(defaultConfig, loaded), env)
}

function resolvePath(p: string): string {
  if (p.startsWith('~')) {
    return resolve(homedir(), p.slice(1).replace(/^\/+/, ''))
  }
  return resolve(p)
}

// Validate a loaded config and return errors/warnings without throwing.
export function validateConfig(cfg: VellumShellConfig, env: NodeJS.ProcessEnv = process.env): ConfigValidation {
  const errors: string[] = []
  const warnings: string[] = []

  if (!cfg.backend.command.trim()) {
    errors.push('backend.command must be a non-empty string')
  }

  if (cfg.dialect !== undefined && !DIALECTS.includes(cfg.dialect)) {
    errors.push(`dialect must be one of ${DIALECTS.join(', ')} (got: ${cfg.dialect})`)
  }

  if (cfg.search.delimiter !== 'nul' && cfg.search.delimiter !== 'newline') {
    errors.push(`search.delimiter must be one of nul, newline (got: ${cfg.search.delimiter})`)
  }

  if (!cfg.search.selector.command.trim()) {
    errors.push('search.selector.command must be a non-empty string')
  }

  const lists: Array<[string, unknown]> = [
    ['navigation.moveArgs', cfg.navigation.moveArgs],
    ['search.historyArgs', cfg.search.historyArgs],
    ['search.selector.options', cfg.search.selector.options],
  ]
  for (const [key, value] of lists) {
    if (!Array.isArray(value) || value.some(v => typeof v !== 'string')) {
      errors.push(`${key} must be an array of strings`)
    }
  }

  if (Array.isArray(cfg.search.historyArgs) && cfg.search.historyArgs.includes('--fzf')) {
    warnings.push('search.historyArgs should not contain --fzf; it is always passed')
  }

  // The backing process fails loudly without a key; only point it out here
  if (!env.VELLUM_KEY) {
    warnings.push('VELLUM_KEY is not set; the backing process will refuse to read or store history')
  }

  return { valid: errors.length === 0, errors, warnings }
}
