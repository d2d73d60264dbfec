import type { VellumShellConfig } from './types'

export const defaultConfig: VellumShellConfig = {
  verbose: false,
  backend: {
    command: 'vellum',
    env: {},
  },
  session: {
    recordStart: true,
  },
  navigation: {
    moveArgs: [],
  },
  search: {
    historyArgs: [],
    sessionOnly: false,
    // `history --fzf` terminates each record with NUL
    delimiter: 'nul',
    selector: {
      command: 'fzf',
      options: [],
    },
  },
  logging: {
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
  },
}

// Merge a partial user config over the defaults, one level deep for each section
export function mergeConfig(base: VellumShellConfig, user: Partial<VellumShellConfig>): VellumShellConfig {
  return {
    ...base,
    ...user,
    backend: { ...base.backend, ...user.backend },
    session: { ...base.session, ...user.session },
    navigation: { ...base.navigation, ...user.navigation },
    search: {
      ...base.search,
      ...user.search,
      selector: { ...base.search.selector, ...user.search?.selector },
    },
    logging: {
      ...base.logging,
      ...user.logging,
      prefixes: { ...base.logging?.prefixes, ...user.logging?.prefixes },
    },
  }
}
