import { describe, expect, it } from 'vitest'
import { defaultConfig } from '../src/defaults'
import { buildSelectorOptions, FzfSelector } from '../src/search/selector'
import { createFakeRunner } from './helpers'

const HISTORY_OPTIONS = '-n2..,.. --scheme=history --bind=ctrl-r:toggle-sort --wrap-sign \'\t↳ \' --highlight-line'

describe('buildSelectorOptions', () => {
  it('composes the default options for NUL separated records', () => {
    expect(buildSelectorOptions(defaultConfig.search, {}))
      .toBe(`--height 40% --min-height 20+ --bind=ctrl-z:ignore ${HISTORY_OPTIONS} +m --read0`)
  })

  it('layers user defaults, overrides and FZF_CTRL_R_OPTS in order', () => {
    const search = {
      ...defaultConfig.search,
      delimiter: 'newline' as const,
      selector: { command: 'fzf', options: ['--exact'] },
    }
    const env = { FZF_DEFAULT_OPTS: '--reverse', FZF_CTRL_R_OPTS: '--no-sort' }

    expect(buildSelectorOptions(search, env))
      .toBe(`--height 40% --min-height 20+ --bind=ctrl-z:ignore --reverse ${HISTORY_OPTIONS} --exact --no-sort +m`)
  })
})

describe('FzfSelector', () => {
  it('pipes the records in and reads the selection back', async () => {
    const { runner, calls } = createFakeRunner(() => ({ stdout: '3\tgit status\n' }))
    const selector = new FzfSelector({
      search: defaultConfig.search,
      runner,
      environment: () => ({ PATH: '/usr/bin', FZF_DEFAULT_OPTS_FILE: '/home/test/.fzfrc' }),
    })

    const result = await selector.select({ records: '3\tgit status\u0000', query: 'git' })

    expect(result).toEqual({ exitCode: 0, output: '3\tgit status\n' })
    expect(calls).toHaveLength(1)
    expect(calls[0].command).toBe('fzf')
    expect(calls[0].args).toEqual(['--query', 'git'])
    expect(calls[0].options.input).toBe('3\tgit status\u0000')
    expect(calls[0].options.stderr).toBe('inherit')
    expect(calls[0].options.env?.PATH).toBe('/usr/bin')
    expect(calls[0].options.env?.FZF_DEFAULT_OPTS_FILE).toBe('')
    expect(calls[0].options.env?.FZF_DEFAULT_OPTS).toBe(buildSelectorOptions(defaultConfig.search, {}))
  })

  it('passes the exit status of a cancelled selection through', async () => {
    const { runner } = createFakeRunner(() => ({ exitCode: 130 }))
    const selector = new FzfSelector({ search: defaultConfig.search, runner, environment: () => ({}) })

    await expect(selector.select({ records: '', query: '' })).resolves.toEqual({ exitCode: 130, output: '' })
  })

  it('uses the configured selector command', () => {
    const selector = new FzfSelector({
      search: { ...defaultConfig.search, selector: { command: 'sk', options: [] } },
    })
    expect(selector.command).toBe('sk')
  })
})
