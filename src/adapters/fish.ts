import type { DialectAdapter } from './types'
import { fzfCommand } from './requirements'

export const fishAdapter: DialectAdapter = {
  name: 'fish',
  requirements: [fzfCommand],
  hooks: {
    capture: 'fish_preexec',
    reset: 'fish_prompt',
  },
  keys: {
    previous: ['\\e[A'],
    next: ['\\e[B'],
    search: ['\\cr'],
  },
}
