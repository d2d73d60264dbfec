import type { LineEditor } from '../input/line-editor'
import type { Logger } from '../logger'
import type { ReadlineHost } from './readline-host'
import { spawn } from 'node:child_process'
import { existsSync, statSync } from 'node:fs'
import { homedir } from 'node:os'
import { basename, resolve } from 'node:path'
import process from 'node:process'
import { createInterface } from 'node:readline'

/**
 * Runs one command line. Resolves with its exit status.
 */
export type LineExecutor = (commandLine: string, env: NodeJS.ProcessEnv, cwd: string) => Promise<number>

// Hand the line to the login shell with the terminal attached
export const shellExecutor: LineExecutor = (commandLine, env, cwd) => {
  return new Promise((resolve) => {
    const child = spawn(env.SHELL || '/bin/sh', ['-c', commandLine], { cwd, env, stdio: 'inherit' })
    child.on('close', (code, signal) => resolve(code ?? (signal === 'SIGINT' ? 130 : 1)))
    child.on('error', (error) => {
      process.stderr.write(`${error.message}\n`)
      resolve(127)
    })
  })
}

export interface ReplManagerOptions {
  host: ReadlineHost
  editor: LineEditor
  log: Logger
  executor?: LineExecutor
  symbol?: string
}

export class ReplManager {
  private host: ReadlineHost
  private editor: LineEditor
  private log: Logger
  private executor: LineExecutor
  private symbol: string
  private running = false
  private cwd = process.cwd()
  private lastExitCode = 0

  constructor(options: ReplManagerOptions) {
    this.host = options.host
    this.editor = options.editor
    this.log = options.log
    this.executor = options.executor ?? shellExecutor
    this.symbol = options.symbol ?? '❯'
  }

  renderPrompt(): string {
    const home = homedir()
    const path = this.cwd === home ? '~' : basename(this.cwd) || this.cwd
    const color = this.lastExitCode === 0 ? '\u001B[32m' : '\u001B[31m'
    return `\u001B[34m${path}\u001B[0m ${color}${this.symbol}\u001B[0m `
  }

  /**
   * Prompt, read, record, run; until end of input or `exit`.
   */
  async start(): Promise<number> {
    if (this.running)
      return this.lastExitCode
    this.running = true

    try {
      while (this.running) {
        await this.host.hooks.emit('prompt:before', '')
        const line = await this.editor.readLine(this.renderPrompt())
        if (line === null)
          break
        await this.runLine(line)
      }
    }
    finally {
      this.running = false
    }

    return this.lastExitCode
  }

  /**
   * Without a terminal there is no prompt and no integration; lines are run
   * as they arrive.
   */
  async runScript(input: NodeJS.ReadableStream): Promise<number> {
    this.running = true
    const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
    try {
      for await (const line of lines) {
        await this.runLine(line)
        if (!this.running)
          break
      }
    }
    finally {
      lines.close()
      this.running = false
    }
    return this.lastExitCode
  }

  stop(): void {
    this.running = false
  }

  async runLine(line: string): Promise<void> {
    if (!line.trim())
      return

    await this.host.hooks.emit('command:before', line)

    const exitCode = await this.execute(line)
    this.lastExitCode = exitCode
    await this.host.hooks.emit('command:after', { command: line, exitCode })
  }

  private async execute(line: string): Promise<number> {
    const [name, ...args] = line.trim().split(/\s+/)

    // Builtins that must change this process rather than a child
    if (name === 'exit') {
      this.stop()
      const code = args[0] === undefined ? this.lastExitCode : Number.parseInt(args[0], 10)
      return Number.isNaN(code) ? 2 : code
    }

    if (name === 'cd' && args.length <= 1) {
      return this.changeDirectory(args[0])
    }

    return this.executor(line, this.host.environment(), this.cwd)
  }

  private changeDirectory(target = '~'): number {
    const expanded = target.startsWith('~') ? `${homedir()}${target.slice(1)}` : target
    const next = resolve(this.cwd, expanded)
    if (!existsSync(next) || !statSync(next).isDirectory()) {
      this.host.writeError(`cd: ${target}: No such file or directory`)
      return 1
    }
    this.cwd = next
    this.log.debug(`cwd is now ${next}`)
    return 0
  }
}
