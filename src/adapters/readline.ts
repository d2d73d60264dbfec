import type { DialectAdapter } from './types'
import { fzfCommand } from './requirements'

// The built-in line editor: hook names are its events, keys are node:readline key names
export const readlineAdapter: DialectAdapter = {
  name: 'readline',
  requirements: [fzfCommand],
  hooks: {
    capture: 'command:before',
    reset: 'prompt:before',
  },
  keys: {
    previous: ['up'],
    next: ['down'],
    search: ['ctrl+r'],
  },
}
