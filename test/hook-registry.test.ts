import { describe, expect, it } from 'vitest'
import { HookRegistry } from '../src/hooks/hook-registry'
import { Logger } from '../src/logger'
import { memoryStream, quietLogger } from './helpers'

interface Events {
  'command:before': string
  'prompt:before': string
}

describe('HookRegistry', () => {
  it('runs handlers in registration order', async () => {
    const registry = new HookRegistry<Events>(quietLogger())
    const seen: string[] = []
    registry.on('command:before', 'first', line => void seen.push(`first:${line}`))
    registry.on('command:before', 'second', line => void seen.push(`second:${line}`))

    const results = await registry.emit('command:before', 'ls')

    expect(seen).toEqual(['first:ls', 'second:ls'])
    expect(results).toEqual([
      { success: true, name: 'first' },
      { success: true, name: 'second' },
    ])
  })

  it('keeps duplicate registrations', async () => {
    const registry = new HookRegistry<Events>()
    registry.on('command:before', 'capture', () => {})
    registry.on('command:before', 'capture', () => {})

    const results = await registry.emit('command:before', 'ls')
    expect(results.map(result => result.name)).toEqual(['capture', 'capture'])
  })

  it('reports a failing handler and keeps going', async () => {
    const stderr = memoryStream()
    const registry = new HookRegistry<Events>(new Logger({ stdout: memoryStream(), stderr }))
    let ran = false
    registry.on('command:before', 'broken', () => {
      throw new Error('boom')
    })
    registry.on('command:before', 'after', () => {
      ran = true
    })

    const results = await registry.emit('command:before', 'ls')

    expect(ran).toBe(true)
    expect(results[0]).toEqual({ success: false, name: 'broken', error: 'boom' })
    expect(stderr.text()).toBe('[ERROR] Error in hook \'broken\' for \'command:before\': boom\n')
  })

  it('unregisters exactly one registration', async () => {
    const registry = new HookRegistry<Events>()
    const off = registry.on('command:before', 'capture', () => {})
    registry.on('command:before', 'other', () => {})

    off()
    off()

    const results = await registry.emit('command:before', 'ls')
    expect(results.map(result => result.name)).toEqual(['other'])
  })

  it('emits nothing for an event without handlers', async () => {
    const registry = new HookRegistry<Events>()
    await expect(registry.emit('prompt:before', '')).resolves.toEqual([])
  })
})
