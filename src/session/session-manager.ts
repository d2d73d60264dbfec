import type { Logger } from '../logger'

export const SESSION_VARIABLE = 'VELLUM_SESSION'
export const SESSION_START_VARIABLE = 'VELLUM_SESSION_START'

export interface Session {
  token: string
  start?: string
}

export interface SessionBackend {
  initSession: () => Promise<string>
  initTimestamp: () => Promise<string>
}

/**
 * Where the session is read from and exported to: the shell's exported
 * environment.
 */
export interface SessionEnvironment {
  getEnv: (name: string) => string | undefined
  exportEnv: (name: string, value: string) => void
}

export interface SessionManagerOptions {
  backend: SessionBackend
  recordStart?: boolean
  log?: Logger
}

export class SessionManager {
  private backend: SessionBackend
  private recordStart: boolean
  private log?: Logger

  constructor(options: SessionManagerOptions) {
    this.backend = options.backend
    this.recordStart = options.recordStart ?? true
    this.log = options.log
  }

  /**
   * Reuse the session already exported into the environment, or ask the
   * backing process for a new one and export it. Throws `BackendError` when
   * no session can be had.
   */
  async establish(env: SessionEnvironment): Promise<Session> {
    const inherited = env.getEnv(SESSION_VARIABLE)
    const token = inherited || await this.backend.initSession()
    if (!inherited) {
      env.exportEnv(SESSION_VARIABLE, token)
    }

    const session: Session = { token }
    if (!this.recordStart) {
      return session
    }

    const inheritedStart = env.getEnv(SESSION_START_VARIABLE)
    if (inheritedStart) {
      session.start = inheritedStart
      return session
    }

    try {
      session.start = await this.backend.initTimestamp()
      env.exportEnv(SESSION_START_VARIABLE, session.start)
    }
    catch (error) {
      // Without a start time the backing process scopes by session id alone
      this.log?.debug('init timestamp failed:', error)
    }

    return session
  }
}
