import type { Requirement } from './types'

export const FZF_URL = 'https://github.com/junegunn/fzf'
export const BASH_PREEXEC_URL = 'https://github.com/rcaloras/bash-preexec'

export const fzfFunction: Requirement = { kind: 'function', name: '__fzfcmd', label: 'fzf', url: FZF_URL }
export const fzfCommand: Requirement = { kind: 'command', name: 'fzf', label: 'fzf', url: FZF_URL }
export const bashPreexec: Requirement = { kind: 'variable', name: 'bash_preexec_imported', label: 'bash_preexec', url: BASH_PREEXEC_URL }
