import type { DialectAdapter } from './types'
import { bashPreexec, fzfFunction } from './requirements'

// bash-preexec supplies the hook arrays; readline key sequences for the arrows
export const bashAdapter: DialectAdapter = {
  name: 'bash',
  requirements: [bashPreexec, fzfFunction],
  hooks: {
    capture: 'preexec_functions',
    reset: 'precmd_functions',
  },
  keys: {
    previous: ['\\e[A', '\\eOA'],
    next: ['\\e[B', '\\eOB'],
    search: ['\\C-r'],
  },
}
