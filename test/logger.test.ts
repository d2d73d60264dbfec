import { describe, expect, it } from 'vitest'
import { Logger } from '../src/logger'
import { memoryStream } from './helpers'

function logger(options: { verbose?: boolean, scope?: string } = {}) {
  const stdout = memoryStream()
  const stderr = memoryStream()
  return { stdout, stderr, log: new Logger({ ...options, stdout, stderr }) }
}

describe('Logger', () => {
  it('writes info to stdout and problems to stderr', () => {
    const { stdout, stderr, log } = logger()

    log.info('session ready', 'sess-1')
    log.warn('slow store')
    log.error('store failed:', new Error('exit 1'))

    expect(stdout.text()).toBe('[INFO] session ready sess-1\n')
    expect(stderr.chunks).toEqual(['[WARN] slow store\n', '[ERROR] store failed: exit 1\n'])
  })

  it('prints debug output only when verbose', () => {
    const quiet = logger()
    quiet.log.debug('hidden')
    expect(quiet.stderr.chunks).toEqual([])

    const loud = logger({ verbose: true })
    loud.log.debug('shown', 42)
    expect(loud.stderr.text()).toBe('[DEBUG] shown 42\n')
  })

  it('tags scoped loggers and keeps their settings', () => {
    const { stderr, log } = logger({ verbose: true })

    log.withScope('cursor').debug('move failed')

    expect(stderr.text()).toBe('[DEBUG] [cursor] move failed\n')
  })

  it('uses configured prefixes', () => {
    const stdout = memoryStream()
    const log = new Logger({ stdout, stderr: memoryStream(), logging: { prefixes: { info: 'vellum' } } })

    log.info('hi')

    expect(stdout.text()).toBe('[vellum] hi\n')
  })
})
