import type { CommandResult } from './runner'

/**
 * Raised when a call to the backing process cannot produce the output a
 * caller depends on.
 */
export class BackendError extends Error {
  readonly command: string
  readonly args: readonly string[]
  readonly exitCode?: number
  readonly stdout: string
  readonly stderr: string

  constructor(message: string, command: string, args: readonly string[], result?: CommandResult, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BackendError'
    this.command = command
    this.args = args
    this.exitCode = result?.exitCode
    this.stdout = result?.stdout ?? ''
    this.stderr = result?.stderr ?? ''
  }

  static fromResult(command: string, args: readonly string[], result: CommandResult): BackendError {
    const detail = result.stderr.trim()
    const message = `${command} ${args.join(' ')} failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`
    return new BackendError(message, command, args, result)
  }

  static fromSpawnError(command: string, args: readonly string[], cause: unknown): BackendError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new BackendError(`${command} could not be started: ${reason}`, command, args, undefined, { cause })
  }
}
