import type { CommandResult, CommandRunner, RunOptions } from '../src/backend/runner'
import type { HookCallback, SetVariableOptions, ShellHost, Widget } from '../src/host'
import type { DialectName } from '../src/types'
import { Logger } from '../src/logger'

export interface RecordedCall {
  command: string
  args: string[]
  options: RunOptions
}

export type Reply = Partial<CommandResult> | Error

/**
 * A runner that never starts a process: each call is recorded and answered
 * by `respond`.
 */
export function createFakeRunner(respond: (args: readonly string[]) => Reply = () => ({})): { runner: CommandRunner, calls: RecordedCall[] } {
  const calls: RecordedCall[] = []
  const runner: CommandRunner = async (command, args, options = {}) => {
    calls.push({ command, args: [...args], options })
    const reply = respond(args)
    if (reply instanceof Error)
      throw reply
    return { exitCode: 0, stdout: '', stderr: '', ...reply }
  }
  return { runner, calls }
}

export interface MemoryStream {
  write: (chunk: string) => boolean
  chunks: string[]
  isTTY: boolean
  text: () => string
}

export function memoryStream(): MemoryStream {
  const chunks: string[] = []
  return {
    chunks,
    isTTY: false,
    write: (chunk) => {
      chunks.push(chunk)
      return true
    },
    text: () => chunks.join(''),
  }
}

// Logger that prints nothing unless a test inspects its streams
export function quietLogger(verbose = false): Logger {
  return new Logger({ verbose, stdout: memoryStream(), stderr: memoryStream() })
}

export interface FakeHostOptions {
  interactive?: boolean
  env?: NodeJS.ProcessEnv
  commands?: string[]
  functions?: string[]
  variables?: Record<string, string>
}

/**
 * In-memory shell: records hooks, key bindings, variables and error lines.
 */
export class FakeHost implements ShellHost {
  readonly interactive: boolean
  readonly hooks = new Map<string, Array<{ name: string, callback: HookCallback }>>()
  readonly keys = new Map<string, Widget>()
  readonly errors: string[] = []
  readonly variables = new Map<string, string>()
  readonly readonlyNames = new Set<string>()
  private env: NodeJS.ProcessEnv
  private commands: Set<string>
  private functions: Set<string>

  constructor(readonly dialect: DialectName = 'readline', options: FakeHostOptions = {}) {
    this.interactive = options.interactive ?? true
    this.env = { ...options.env }
    this.commands = new Set(options.commands ?? ['fzf'])
    this.functions = new Set(options.functions ?? [])
    for (const [name, value] of Object.entries(options.variables ?? {}))
      this.variables.set(name, value)
  }

  getVariable(name: string): string | undefined {
    return this.variables.get(name) ?? this.env[name]
  }

  setVariable(name: string, value: string, options: SetVariableOptions = {}): void {
    if (this.readonlyNames.has(name))
      throw new Error(`${name}: readonly variable`)
    this.variables.set(name, value)
    if (options.readonly)
      this.readonlyNames.add(name)
    if (options.exported)
      this.env[name] = value
  }

  environment(): NodeJS.ProcessEnv {
    return { ...this.env }
  }

  hasCommand(name: string): boolean {
    return this.commands.has(name)
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name)
  }

  addHook(nativeHook: string, name: string, callback: HookCallback): void {
    const list = this.hooks.get(nativeHook) ?? []
    list.push({ name, callback })
    this.hooks.set(nativeHook, list)
  }

  bindKey(nativeKey: string, widget: Widget): void {
    this.keys.set(nativeKey, widget)
  }

  writeError(line: string): void {
    this.errors.push(line)
  }

  async fire(nativeHook: string, commandLine = ''): Promise<void> {
    for (const { callback } of this.hooks.get(nativeHook) ?? [])
      await callback(commandLine)
  }

  hookNames(nativeHook: string): string[] {
    return (this.hooks.get(nativeHook) ?? []).map(hook => hook.name)
  }
}
