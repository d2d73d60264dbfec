#!/usr/bin/env -S tsx
import type { DialectName, VellumShellConfig } from '../src/types'
import { readFileSync } from 'node:fs'
import process from 'node:process'
import { CAC } from 'cac'
import { detectDialect, getAdapter, isDialectName, isSatisfied } from '../src/adapters'
import { isScriptDialect, renderInitScript } from '../src/adapters/script'
import { loadVellumConfig, validateConfig } from '../src/config'
import { LineEditor } from '../src/input/line-editor'
import { ShellIntegration } from '../src/integration'
import { Logger } from '../src/logger'
import { ReadlineHost } from '../src/shell/readline-host'
import { ReplManager } from '../src/shell/repl-manager'

const cli = new CAC('vellum-shell')

interface CliOptions {
  verbose?: boolean
  config?: string
  dialect?: string
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string')
    return pkg.version
  return '0.0.0'
}

function pickDialect(requested: string | undefined, configured: DialectName | undefined): DialectName {
  if (requested === undefined)
    return configured ?? detectDialect(process.env)
  if (!isDialectName(requested))
    throw new Error(`Unknown dialect '${requested}'`)
  return requested
}

// Default command - start the shell
cli
  .command('', 'Start an interactive shell with history integration')
  .option('--verbose', 'Enable verbose logging')
  .option('--config <config>', 'Path to config file')
  .action(async (options: CliOptions) => {
    let cfg: VellumShellConfig
    try {
      cfg = await loadVellumConfig({ path: options.config })
    }
    catch (err) {
      process.stderr.write(`config error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
      return
    }
    const config = { ...cfg, verbose: options.verbose ?? cfg.verbose }
    const log = new Logger({ verbose: config.verbose, logging: config.logging, scope: 'vellum' })

    const interactive = Boolean(process.stdin.isTTY)
    const editor = new LineEditor({ log: log.withScope('editor') })
    const host = new ReadlineHost({ editor, interactive, log })
    const integration = new ShellIntegration({ config, log })
    const repl = new ReplManager({ host, editor, log: log.withScope('repl') })

    const result = await integration.initialize(host)
    log.debug(`integration: ${result.status}`)

    const onSigterm = () => {
      repl.stop()
      process.exit(143) // 128 + SIGTERM
    }
    process.on('SIGTERM', onSigterm)

    try {
      process.exitCode = interactive ? await repl.start() : await repl.runScript(process.stdin)
    }
    catch (err) {
      process.stderr.write(`Shell error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
    }
    finally {
      process.off('SIGTERM', onSigterm)
    }
  })

cli
  .command('init [dialect]', 'Print the setup script for bash, zsh or fish')
  .option('--config <config>', 'Path to config file')
  .example('eval "$(vellum-shell init zsh)"')
  .action(async (dialect: string | undefined, options: CliOptions) => {
    try {
      const cfg = await loadVellumConfig({ path: options.config })
      const name = pickDialect(dialect, cfg.dialect)
      if (!isScriptDialect(name))
        throw new Error(`${name} has no setup script; run vellum-shell to start the built-in shell`)
      process.stdout.write(renderInitScript(name, cfg))
    }
    catch (err) {
      process.stderr.write(`init error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
    }
  })

cli
  .command('doctor', 'Check that everything the integration needs is present')
  .option('--dialect <dialect>', 'Dialect to check (bash, zsh, fish, readline)')
  .option('--config <config>', 'Path to config file')
  .action(async (options: CliOptions) => {
    try {
      const cfg = await loadVellumConfig({ path: options.config })
      const adapter = getAdapter(pickDialect(options.dialect, cfg.dialect))
      const probe = new ReadlineHost({ editor: new LineEditor(), interactive: false })
      let ok = true

      const report = (passed: boolean, text: string) => {
        process.stdout.write(`${passed ? 'ok  ' : 'FAIL'} ${text}\n`)
        ok = ok && passed
      }

      // Functions and variables of other shells cannot be probed from here
      for (const requirement of adapter.requirements) {
        if (requirement.kind === 'command')
          report(isSatisfied(requirement, probe), `${requirement.label} (${requirement.url})`)
        else
          process.stdout.write(`skip ${requirement.label}: checked by ${adapter.name} at startup\n`)
      }
      report(probe.hasCommand(cfg.backend.command), `${cfg.backend.command} on PATH`)
      report(Boolean(process.env.VELLUM_KEY), 'VELLUM_KEY is set')

      process.exitCode = ok ? 0 : 1
    }
    catch (err) {
      process.stderr.write(`doctor error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
    }
  })

cli
  .command('config', 'Print the resolved configuration and any problems with it')
  .option('--config <config>', 'Path to config file')
  .action(async (options: CliOptions) => {
    try {
      const cfg = await loadVellumConfig({ path: options.config })
      process.stdout.write(`${JSON.stringify(cfg, null, 2)}\n`)

      const { valid, errors, warnings } = validateConfig(cfg)
      for (const warning of warnings)
        process.stderr.write(`warning: ${warning}\n`)
      for (const error of errors)
        process.stderr.write(`error: ${error}\n`)
      process.exitCode = valid ? 0 : 1
    }
    catch (err) {
      process.stderr.write(`config error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
    }
  })

const version = readVersion()

cli.command('version', 'Show the version').action(() => {
  process.stdout.write(`${version}\n`)
})

cli.version(version)
cli.help()
cli.parse()
