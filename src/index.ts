export * from './adapters'
export * from './adapters/script'
export * from './backend/backing-process'
export * from './backend/errors'
export * from './backend/runner'
export * from './config'
export * from './context'
export * from './cursor/cursor-state-machine'
export * from './hooks/hook-registry'
export * from './host'
export * from './input/line-editor'
export * from './input/text-buffer'
export * from './integration'
export * from './logger'
export * from './protocol/codec'
export * from './search/search-bridge'
export * from './search/selector'
export * from './session/session-manager'
export * from './shell/readline-host'
export * from './shell/repl-manager'
export * from './types'
