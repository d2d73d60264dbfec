import type { HookCallback, SetVariableOptions, ShellHost, Widget } from '../host'
import type { LineEditor } from '../input/line-editor'
import type { Logger } from '../logger'
import type { CommandAfterData } from '../types'
import { accessSync, constants, statSync } from 'node:fs'
import { delimiter, isAbsolute, join } from 'node:path'
import process from 'node:process'
import { HookRegistry } from '../hooks/hook-registry'

export interface ReplEvents {
  'prompt:before': string
  'command:before': string
  'command:after': CommandAfterData
}

type HookableEvent = 'prompt:before' | 'command:before'

function isHookableEvent(name: string): name is HookableEvent {
  return name === 'prompt:before' || name === 'command:before'
}

interface Variable {
  value: string
  readonly: boolean
}

export interface ReadlineHostOptions {
  editor: LineEditor
  interactive?: boolean
  env?: NodeJS.ProcessEnv
  stderr?: { write: (chunk: string) => unknown }
  log?: Logger
}

/**
 * The built-in shell as a host: variables live in this object, exported ones
 * also in the environment handed to child processes, hooks in a registry and
 * key bindings in the line editor.
 */
export class ReadlineHost implements ShellHost {
  readonly dialect = 'readline' as const
  readonly interactive: boolean
  readonly hooks: HookRegistry<ReplEvents>
  private editor: LineEditor
  private variables = new Map<string, Variable>()
  private env: NodeJS.ProcessEnv
  private stderr: { write: (chunk: string) => unknown }

  constructor(options: ReadlineHostOptions) {
    this.editor = options.editor
    this.interactive = options.interactive ?? true
    this.env = { ...(options.env ?? process.env) }
    this.stderr = options.stderr ?? process.stderr
    this.hooks = new HookRegistry<ReplEvents>(options.log)
  }

  getVariable(name: string): string | undefined {
    return this.variables.get(name)?.value ?? this.env[name]
  }

  setVariable(name: string, value: string, options: SetVariableOptions = {}): void {
    const existing = this.variables.get(name)
    if (existing?.readonly) {
      throw new Error(`${name}: readonly variable`)
    }
    this.variables.set(name, { value, readonly: options.readonly ?? false })
    if (options.exported) {
      this.env[name] = value
    }
  }

  environment(): NodeJS.ProcessEnv {
    return { ...this.env }
  }

  hasCommand(name: string): boolean {
    if (isAbsolute(name) || name.includes('/')) {
      return isExecutable(name)
    }
    const dirs = (this.env.PATH ?? '').split(delimiter).filter(Boolean)
    return dirs.some(dir => isExecutable(join(dir, name)))
  }

  // The built-in shell has no shell functions
  hasFunction(_name: string): boolean {
    return false
  }

  addHook(nativeHook: string, name: string, callback: HookCallback): void {
    if (!isHookableEvent(nativeHook)) {
      throw new Error(`Unknown hook '${nativeHook}'`)
    }
    this.hooks.on(nativeHook, name, callback)
  }

  bindKey(nativeKey: string, widget: Widget): void {
    this.editor.bind(nativeKey, widget)
  }

  writeError(line: string): void {
    this.stderr.write(`${line}\n`)
  }
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK)
    return statSync(path).isFile()
  }
  catch {
    return false
  }
}
