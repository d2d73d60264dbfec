import type { HistoryListing, MoveReply, NavigationRequest } from '../protocol/codec'
import type { BackendConfig } from '../types'
import type { CommandResult, CommandRunner, RunOptions } from './runner'
import process from 'node:process'
import { decodeMove, encodeHistory, encodeInit, encodeMove, encodeStore, stripTrailingNewlines } from '../protocol/codec'
import { BackendError } from './errors'
import { spawnRunner } from './runner'

export interface BackingProcessOptions {
  config: BackendConfig
  runner?: CommandRunner
  /** Environment for each call, read at call time so exported session variables apply */
  environment?: () => NodeJS.ProcessEnv
}

/**
 * Typed calls into the `vellum` binary. Every method is one subprocess run.
 */
export class BackingProcess {
  private config: BackendConfig
  private runner: CommandRunner
  private environment: () => NodeJS.ProcessEnv

  constructor(options: BackingProcessOptions) {
    this.config = options.config
    this.runner = options.runner ?? spawnRunner
    this.environment = options.environment ?? (() => process.env)
  }

  get command(): string {
    return this.config.command
  }

  async run(args: readonly string[], options: Omit<RunOptions, 'env'> = {}): Promise<CommandResult> {
    const env = { ...this.environment(), ...this.config.env }
    try {
      return await this.runner(this.config.command, args, { ...options, env })
    }
    catch (error) {
      throw BackendError.fromSpawnError(this.config.command, args, error)
    }
  }

  async initSession(): Promise<string> {
    return this.readToken(encodeInit('session'))
  }

  async initTimestamp(): Promise<string> {
    return this.readToken(encodeInit('timestamp'))
  }

  // Exit status is the caller's to ignore
  async store(commandLine: string): Promise<CommandResult> {
    return this.run(encodeStore(commandLine))
  }

  async move(request: NavigationRequest): Promise<MoveReply> {
    const args = encodeMove(request)
    const result = await this.run(args)
    if (result.exitCode !== 0) {
      throw BackendError.fromResult(this.config.command, args, result)
    }
    return decodeMove(result.stdout)
  }

  async listHistory(listing: HistoryListing = {}): Promise<string> {
    const args = encodeHistory(listing)
    const result = await this.run(args)
    if (result.exitCode !== 0) {
      throw BackendError.fromResult(this.config.command, args, result)
    }
    return result.stdout
  }

  private async readToken(args: string[]): Promise<string> {
    const result = await this.run(args)
    const token = stripTrailingNewlines(result.stdout).trim()
    if (result.exitCode !== 0) {
      throw BackendError.fromResult(this.config.command, args, result)
    }
    if (!token) {
      throw new BackendError(`${this.config.command} ${args.join(' ')} printed nothing`, this.config.command, args, result)
    }
    return token
  }
}
