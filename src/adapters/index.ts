import type { ShellHost } from '../host'
import type { DialectName } from '../types'
import type { DialectAdapter, IntegrationOperations, Requirement } from './types'
import { basename } from 'node:path'
import { bashAdapter } from './bash'
import { fishAdapter } from './fish'
import { readlineAdapter } from './readline'
import { zshAdapter } from './zsh'

export type { DialectAdapter, IntegrationOperations, Requirement } from './types'
export { bashAdapter, fishAdapter, readlineAdapter, zshAdapter }

export const CAPTURE_HOOK = '__vellum_preexec'
export const RESET_HOOK = '__vellum_precmd'

const adapters: Record<DialectName, DialectAdapter> = {
  bash: bashAdapter,
  zsh: zshAdapter,
  fish: fishAdapter,
  readline: readlineAdapter,
}

export function getAdapter(name: DialectName): DialectAdapter {
  return adapters[name]
}

export function isDialectName(name: string): name is DialectName {
  return Object.prototype.hasOwnProperty.call(adapters, name)
}

/**
 * Pick the dialect from the login shell's name; anything unknown gets the
 * built-in line editor.
 */
export function detectDialect(env: NodeJS.ProcessEnv): DialectName {
  const shell = env.SHELL ? basename(env.SHELL) : ''
  return isDialectName(shell) ? shell : 'readline'
}

export function isSatisfied(requirement: Requirement, host: ShellHost): boolean {
  switch (requirement.kind) {
    case 'command':
      return host.hasCommand(requirement.name)
    case 'function':
      return host.hasFunction(requirement.name)
    case 'variable':
      return Boolean(host.getVariable(requirement.name))
  }
}

// The one line a shell prints when a requirement is missing
export function requirementMessage(requirement: Requirement): string {
  return `${requirement.label} is required! see ${requirement.url}`
}

export function missingRequirements(adapter: DialectAdapter, host: ShellHost): Requirement[] {
  return adapter.requirements.filter(requirement => !isSatisfied(requirement, host))
}

/**
 * Map the dialect's native hooks and keys onto the four operations. Holds no
 * state of its own.
 */
export function installAdapter(adapter: DialectAdapter, host: ShellHost, operations: IntegrationOperations): void {
  host.addHook(adapter.hooks.capture, CAPTURE_HOOK, commandLine => operations.capture(commandLine))
  host.addHook(adapter.hooks.reset, RESET_HOOK, () => operations.reset())

  for (const key of adapter.keys.previous) {
    host.bindKey(key, buffer => operations.navigate(-1, buffer))
  }
  for (const key of adapter.keys.next) {
    host.bindKey(key, buffer => operations.navigate(1, buffer))
  }
  for (const key of adapter.keys.search) {
    host.bindKey(key, buffer => operations.search(buffer))
  }
}
