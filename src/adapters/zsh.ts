import type { DialectAdapter } from './types'
import { fzfFunction } from './requirements'

// zle widgets are replaced by name, so the substring-search plugin's widgets are taken over too
export const zshAdapter: DialectAdapter = {
  name: 'zsh',
  requirements: [fzfFunction],
  hooks: {
    capture: 'preexec_functions',
    reset: 'precmd_functions',
  },
  keys: {
    previous: ['up-line-or-history', 'history-substring-search-up'],
    next: ['down-line-or-history', 'history-substring-search-down'],
    search: ['^R'],
  },
}
