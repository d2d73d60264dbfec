import type { VellumShellConfig } from '../src/types'
import { defaultConfig } from '../src/defaults'

/**
 * Example vellum-shell configuration
 *
 * Copy to `vellum-shell.config.ts` in your home or project directory, or
 * point `VELLUM_SHELL_CONFIG` at it. `VELLUM_MOVE_ARGS`, `VELLUM_HISTORY_ARGS`
 * and `VELLUM_EDITOR` still win over what is set here.
 */
const exampleConfig: VellumShellConfig = {
  ...defaultConfig,
  verbose: false,

  // Script written by `vellum-shell init`; leave unset to follow $SHELL
  dialect: 'zsh',

  backend: {
    command: 'vellum',
    env: {
      VELLUM_CONFIG: '~/.config/vellum/config.toml',
    },
  },

  session: {
    recordStart: true,
  },

  // Arrow keys skip repeated commands
  navigation: {
    moveArgs: ['--no-duplicates'],
  },

  search: {
    historyArgs: [],
    sessionOnly: false,
    delimiter: 'nul',
    selector: {
      command: 'fzf',
      options: ['--exact', '--no-sort'],
    },
  },

  logging: {
    timestamps: true,
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
  },
}

export default exampleConfig
