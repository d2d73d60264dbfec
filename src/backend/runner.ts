import { spawn } from 'node:child_process'
import process from 'node:process'

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGPIPE: 13,
  SIGTERM: 15,
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
  /**
   * `inherit` leaves stderr attached to the terminal, which interactive
   * children such as the selector need.
   */
  stderr?: 'pipe' | 'inherit'
}

/**
 * Runs a program to completion. Resolves with its exit status whatever it is;
 * rejects only when the program cannot be started at all.
 */
export type CommandRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<CommandResult>

export const spawnRunner: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd || process.cwd(),
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', options.stderr ?? 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let completed = false

    child.stdout?.setEncoding('utf8')
    child.stdout?.on('data', (data: string) => {
      stdout += data
    })

    child.stderr?.setEncoding('utf8')
    child.stderr?.on('data', (data: string) => {
      stderr += data
    })

    child.on('close', (code, signal) => {
      if (completed)
        return
      completed = true
      // 128 + n for a signalled child, like a shell reports it
      const exitCode = code ?? 128 + (signal ? SIGNAL_NUMBERS[signal] ?? 0 : 0)
      resolve({ exitCode, stdout, stderr })
    })

    child.on('error', (error) => {
      if (completed)
        return
      completed = true
      reject(error)
    })

    // The child may exit before reading everything we offer; its exit status tells the rest
    child.stdin?.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EPIPE' || completed)
        return
      completed = true
      child.kill()
      reject(error)
    })
    if (options.input !== undefined) {
      child.stdin?.end(options.input)
    }
    else {
      child.stdin?.end()
    }
  })
}
