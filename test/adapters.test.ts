import type { IntegrationOperations } from '../src/adapters'
import { describe, expect, it, vi } from 'vitest'
import {
  bashAdapter,
  CAPTURE_HOOK,
  detectDialect,
  fishAdapter,
  getAdapter,
  installAdapter,
  isDialectName,
  missingRequirements,
  RESET_HOOK,
  zshAdapter,
} from '../src/adapters'
import { TextBuffer } from '../src/input/text-buffer'
import { FakeHost } from './helpers'

function operations() {
  const ops = {
    capture: vi.fn(async (_commandLine: string) => {}),
    reset: vi.fn(() => {}),
    navigate: vi.fn(async () => 0),
    search: vi.fn(async () => 0),
  } satisfies IntegrationOperations
  return ops
}

describe('dialect detection', () => {
  it('picks the dialect from the login shell', () => {
    expect(detectDialect({ SHELL: '/usr/bin/zsh' })).toBe('zsh')
    expect(detectDialect({ SHELL: '/bin/bash' })).toBe('bash')
    expect(detectDialect({ SHELL: '/usr/local/bin/fish' })).toBe('fish')
  })

  it('falls back to the built-in editor', () => {
    expect(detectDialect({ SHELL: '/bin/tcsh' })).toBe('readline')
    expect(detectDialect({})).toBe('readline')
  })

  it('knows its dialect names', () => {
    expect(isDialectName('fish')).toBe(true)
    expect(isDialectName('toString')).toBe(false)
    expect(getAdapter('zsh')).toBe(zshAdapter)
  })
})

describe('requirements', () => {
  it('needs bash-preexec and the fzf key bindings in bash', () => {
    const host = new FakeHost('bash')
    expect(missingRequirements(bashAdapter, host).map(r => r.label)).toEqual(['bash_preexec', 'fzf'])

    const ready = new FakeHost('bash', { functions: ['__fzfcmd'], variables: { bash_preexec_imported: 'defined' } })
    expect(missingRequirements(bashAdapter, ready)).toEqual([])
  })

  it('needs the fzf binary in fish', () => {
    expect(missingRequirements(fishAdapter, new FakeHost('fish', { commands: [] })).map(r => r.name)).toEqual(['fzf'])
    expect(missingRequirements(fishAdapter, new FakeHost('fish'))).toEqual([])
  })
})

describe('installAdapter', () => {
  it('registers capture and reset under fixed names on the dialect hooks', () => {
    const host = new FakeHost('bash')
    installAdapter(bashAdapter, host, operations())

    expect(host.hookNames('preexec_functions')).toEqual([CAPTURE_HOOK])
    expect(host.hookNames('precmd_functions')).toEqual([RESET_HOOK])
  })

  it('binds both arrow sequences in bash', () => {
    const host = new FakeHost('bash')
    installAdapter(bashAdapter, host, operations())

    expect([...host.keys.keys()]).toEqual(['\\e[A', '\\eOA', '\\e[B', '\\eOB', '\\C-r'])
  })

  it('takes over the substring-search widgets in zsh', () => {
    const host = new FakeHost('zsh')
    installAdapter(zshAdapter, host, operations())

    expect([...host.keys.keys()]).toEqual([
      'up-line-or-history',
      'history-substring-search-up',
      'down-line-or-history',
      'history-substring-search-down',
      '^R',
    ])
  })

  it('forwards hooks and keys to the operations', async () => {
    const host = new FakeHost('fish')
    const ops = operations()
    installAdapter(fishAdapter, host, ops)
    const buffer = new TextBuffer()

    await host.fire('fish_preexec', 'make test')
    await host.fire('fish_prompt')
    await host.keys.get('\\e[A')?.(buffer)
    await host.keys.get('\\e[B')?.(buffer)
    await host.keys.get('\\cr')?.(buffer)

    expect(ops.capture).toHaveBeenCalledWith('make test')
    expect(ops.reset).toHaveBeenCalledTimes(1)
    expect(ops.navigate.mock.calls).toEqual([[-1, buffer], [1, buffer]])
    expect(ops.search).toHaveBeenCalledWith(buffer)
  })
})
