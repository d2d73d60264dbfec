import { PassThrough } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'
import { LineEditor } from '../src/input/line-editor'
import { ReadlineHost } from '../src/shell/readline-host'
import { memoryStream, quietLogger } from './helpers'

function host(env: NodeJS.ProcessEnv = { PATH: '' }) {
  const editor = new LineEditor({ input: new PassThrough(), output: memoryStream() })
  const stderr = memoryStream()
  return { editor, stderr, host: new ReadlineHost({ editor, env, stderr, log: quietLogger() }) }
}

describe('ReadlineHost', () => {
  it('keeps shell variables out of the environment unless exported', () => {
    const { host: shell } = host()
    shell.setVariable('LOCAL', 'one')
    shell.setVariable('VELLUM_SESSION', 'sess-1', { exported: true })

    expect(shell.getVariable('LOCAL')).toBe('one')
    expect(shell.environment().LOCAL).toBeUndefined()
    expect(shell.environment().VELLUM_SESSION).toBe('sess-1')
  })

  it('reads variables from the environment it started with', () => {
    const { host: shell } = host({ PATH: '', VELLUM_SESSION: 'parent' })
    expect(shell.getVariable('VELLUM_SESSION')).toBe('parent')
  })

  it('refuses to overwrite a readonly variable', () => {
    const { host: shell } = host()
    shell.setVariable('__VELLUM_SETUP', '1', { readonly: true })

    expect(() => shell.setVariable('__VELLUM_SETUP', '2')).toThrow('__VELLUM_SETUP: readonly variable')
    expect(shell.getVariable('__VELLUM_SETUP')).toBe('1')
  })

  it('hands out copies of the environment', () => {
    const { host: shell } = host()
    const env = shell.environment()
    env.INJECTED = 'x'
    expect(shell.environment().INJECTED).toBeUndefined()
  })

  it('registers hooks on its own events only', async () => {
    const { host: shell } = host()
    const seen: string[] = []
    shell.addHook('command:before', 'capture', (line) => {
      seen.push(line)
    })

    await shell.hooks.emit('command:before', 'ls')

    expect(seen).toEqual(['ls'])
    expect(() => shell.addHook('preexec_functions', 'capture', () => {})).toThrow('Unknown hook \'preexec_functions\'')
  })

  it('binds keys in its line editor', () => {
    const { host: shell, editor } = host()
    const bind = vi.spyOn(editor, 'bind')
    const widget = async () => 0

    shell.bindKey('ctrl+r', widget)

    expect(bind).toHaveBeenCalledWith('ctrl+r', widget)
  })

  it('finds no commands on an empty PATH and has no shell functions', () => {
    const { host: shell } = host()
    expect(shell.hasCommand('fzf')).toBe(false)
    expect(shell.hasCommand('/nonexistent/fzf')).toBe(false)
    expect(shell.hasFunction('__fzfcmd')).toBe(false)
  })

  it('writes errors as lines', () => {
    const { host: shell, stderr } = host()
    shell.writeError('fzf is required! see https://github.com/junegunn/fzf')
    expect(stderr.text()).toBe('fzf is required! see https://github.com/junegunn/fzf\n')
  })

  it('is the readline dialect', () => {
    expect(host().host.dialect).toBe('readline')
    expect(host().host.interactive).toBe(true)
  })
})
