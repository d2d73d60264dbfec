import type { DialectName, VellumShellConfig } from '../types'
import type { Requirement } from './types'
import { defaultConfig } from '../defaults'
import { SETUP_SENTINEL } from '../integration'
import { encodeHistory, encodeInit, MOVE_COMMAND, STORE_COMMAND } from '../protocol/codec'
import { FZF_BASE_OPTIONS, FZF_HISTORY_OPTIONS } from '../search/selector'
import { SESSION_START_VARIABLE, SESSION_VARIABLE } from '../session/session-manager'
import { CAPTURE_HOOK, getAdapter, requirementMessage, RESET_HOOK } from './index'

/** Dialects that are set up by sourcing a script into the running shell */
export type ScriptDialect = Exclude<DialectName, 'readline'>

export function isScriptDialect(name: DialectName): name is ScriptDialect {
  return name !== 'readline'
}

// Shell variable holding the id of the entry last shown by the arrow keys
const CURSOR_VARIABLE = '__VELLUM_LINE'
const BACKEND_FUNCTION = '__vellum'
const MOVE_FUNCTION = '__vellum_move'
const PREVIOUS_FUNCTION = '__vellum_previous'
const NEXT_FUNCTION = '__vellum_next'
const SEARCH_FUNCTION = '__vellum_search'

const SAFE_WORD = /^[\w@%+=:,./-]+$/

function quote(word: string, dialect: ScriptDialect): string {
  if (SAFE_WORD.test(word))
    return word
  if (dialect === 'fish')
    return `'${word.replace(/[\\']/g, '\\$&')}'`
  return `'${word.replace(/'/g, `'\\''`)}'`
}

function words(args: readonly string[], dialect: ScriptDialect): string {
  return args.map(arg => quote(arg, dialect)).join(' ')
}

// Text placed inside a double-quoted string
function escapeDouble(text: string, dialect: ScriptDialect): string {
  return text.replace(dialect === 'fish' ? /[\\"$]/g : /[\\"$`]/g, '\\$&')
}

function indent(lines: readonly string[]): string[] {
  return lines.map(line => (line ? `    ${line}` : line))
}

const MISSING: Record<ScriptDialect, Record<Requirement['kind'], (name: string) => string>> = {
  bash: {
    command: name => `! command -v ${name} >/dev/null 2>&1`,
    function: name => `[[ "$(type -t ${name})" != "function" ]]`,
    variable: name => `[[ -z "\${${name}:-}" ]]`,
  },
  zsh: {
    command: name => `! (( \${+commands[${name}]} ))`,
    function: name => `[[ "$(whence -w ${name})" != "${name}: function" ]]`,
    variable: name => `[[ -z "\${${name}:-}" ]]`,
  },
  fish: {
    command: name => `not command -sq ${name}`,
    function: name => `not functions -q ${name}`,
    variable: name => `not set -q ${name}`,
  },
}

const ALREADY_SET_UP: Record<ScriptDialect, string> = {
  bash: `[[ -n "\${${SETUP_SENTINEL}:-}" || ! $- =~ i ]]`,
  zsh: `[[ -n "\${${SETUP_SENTINEL}:-}" || ! -o interactive ]]`,
  fish: `set -q ${SETUP_SENTINEL}; or not status is-interactive`,
}

interface Branch {
  test: string
  body: string[]
}

function conditional(dialect: ScriptDialect, branches: readonly Branch[], otherwise: readonly string[]): string[] {
  const lines: string[] = []
  branches.forEach((branch, index) => {
    if (dialect === 'fish')
      lines.push(`${index === 0 ? 'if' : 'else if'} ${branch.test}`)
    else
      lines.push(`${index === 0 ? 'if' : 'elif'} ${branch.test}; then`)
    lines.push(...indent(branch.body))
  })
  lines.push('else', ...indent(otherwise), dialect === 'fish' ? 'end' : 'fi')
  return lines
}

// The values every dialect bakes into its script, already quoted for it
interface ScriptParts {
  dialect: ScriptDialect
  recordStart: boolean
  backend: string
  initSession: string
  initTimestamp: string
  store: string
  move: string
  moveArgs: string
  history: string
  /** Selector options after the user's `FZF_DEFAULT_OPTS`, escaped for a double-quoted string */
  selectorOptions: string
  selectorTail: string
  selector: string
}

function scriptParts(dialect: ScriptDialect, config: VellumShellConfig): ScriptParts {
  // Same precedence as the in-process integration: configured backend env wins
  const env: Record<string, string> = { ...(config.editor ? { VELLUM_EDITOR: config.editor } : {}), ...config.backend.env }
  const assignments = Object.entries(env).map(([name, value]) => `${name}=${quote(value, dialect)} `).join('')
  const { search } = config

  return {
    dialect,
    recordStart: config.session.recordStart,
    backend: `${assignments}command ${quote(config.backend.command, dialect)}`,
    initSession: `${BACKEND_FUNCTION} ${words(encodeInit('session'), dialect)}`,
    initTimestamp: `${BACKEND_FUNCTION} ${words(encodeInit('timestamp'), dialect)}`,
    store: `${BACKEND_FUNCTION} ${words(STORE_COMMAND, dialect)}`,
    move: `${BACKEND_FUNCTION} ${words(MOVE_COMMAND, dialect)}`,
    moveArgs: words(config.navigation.moveArgs, dialect),
    history: `${BACKEND_FUNCTION} ${words(encodeHistory({ sessionOnly: search.sessionOnly, extraArgs: search.historyArgs }), dialect)}`,
    selectorOptions: escapeDouble([...FZF_HISTORY_OPTIONS, ...search.selector.options].join(' '), dialect),
    selectorTail: search.delimiter === 'nul' ? '+m --read0' : '+m',
    selector: quote(search.selector.command, dialect),
  }
}

function guarded(parts: ScriptParts, setup: readonly string[]): string[] {
  const adapter = getAdapter(parts.dialect)
  const branches: Branch[] = adapter.requirements.map(requirement => ({
    test: MISSING[parts.dialect][requirement.kind](requirement.name),
    body: [`echo ${quote(requirementMessage(requirement), parts.dialect)} >&2`],
  }))
  branches.push({ test: ALREADY_SET_UP[parts.dialect], body: ['true'] })
  return conditional(parts.dialect, branches, setup)
}

// Arguments passed between the prefix and the direction, with a separating space
function moveArgs(parts: ScriptParts): string {
  return parts.moveArgs ? ` ${parts.moveArgs}` : ''
}

function posixSession(parts: ScriptParts): string[] {
  const exported = parts.recordStart ? `${SESSION_VARIABLE} ${SESSION_START_VARIABLE}` : SESSION_VARIABLE
  return [
    `if [[ -z "\${${SESSION_VARIABLE}:-}" ]]; then`,
    `    ${SESSION_VARIABLE}="$(${parts.initSession})"`,
    ...(parts.recordStart ? [`    ${SESSION_START_VARIABLE}="$(${parts.initTimestamp})"`] : []),
    'fi',
    `export ${exported}`,
  ]
}

function posixHooks(parts: ScriptParts, zsh: boolean): string[] {
  const adapter = getAdapter(parts.dialect)
  return [
    `${CAPTURE_HOOK}() {`,
    `    ${parts.store} "$1"`,
    '}',
    ...(zsh ? [`typeset -ga ${adapter.hooks.capture}`] : []),
    `${adapter.hooks.capture}+=(${CAPTURE_HOOK})`,
    '',
    `${RESET_HOOK}() {`,
    `    ${CURSOR_VARIABLE}=""`,
    '}',
    ...(zsh ? [`typeset -ga ${adapter.hooks.reset}`] : []),
    `${adapter.hooks.reset}+=(${RESET_HOOK})`,
  ]
}

// `buffer` and `point` name the line editor's variables
function posixMove(parts: ScriptParts, buffer: string, point: string): string[] {
  return [
    `${MOVE_FUNCTION}() {`,
    '    local vellum_output',
    '    local -a vellum_search=()',
    `    if [[ -z "\${${CURSOR_VARIABLE}:-}" ]]; then`,
    `        vellum_search+=("--prefix=\${${buffer}}")`,
    '    fi',
    `    vellum_output="$(${parts.move} "\${vellum_search[@]}"${moveArgs(parts)} -- "$1" "\${${CURSOR_VARIABLE}:-}")" || return`,
    `    [[ "$vellum_output" == *'|'* ]] || return`,
    `    ${CURSOR_VARIABLE}="\${vellum_output%%|*}"`,
    `    ${buffer}="\${vellum_output#*|}"`,
    `    ${point}="\${#${buffer}}"`,
    '}',
  ]
}

function renderBash(parts: ScriptParts): string[] {
  const adapter = getAdapter('bash')
  const setup = [
    `readonly ${SETUP_SENTINEL}=1`,
    '',
    `${BACKEND_FUNCTION}() {`,
    `    ${parts.backend} "$@"`,
    '}',
    '',
    ...posixSession(parts),
    '',
    ...posixHooks(parts, false),
    '',
    `${SEARCH_FUNCTION}() {`,
    '    local output',
    '    output="$(',
    `        ${parts.history} |`,
    `            FZF_DEFAULT_OPTS=$(__fzf_defaults "" "${parts.selectorOptions} \${FZF_CTRL_R_OPTS-} ${parts.selectorTail}") \\`,
    `            FZF_DEFAULT_OPTS_FILE='' $(__fzfcmd) --query "\${READLINE_LINE}"`,
    '    )" || return',
    `    READLINE_LINE="\${output#*$'\\t'}"`,
    '    READLINE_POINT="${#READLINE_LINE}"',
    `    ${CURSOR_VARIABLE}=""`,
    '}',
    '',
    ...posixMove(parts, 'READLINE_LINE', 'READLINE_POINT'),
    '',
    `${PREVIOUS_FUNCTION}() {`,
    `    ${MOVE_FUNCTION} -1`,
    '}',
    '',
    `${NEXT_FUNCTION}() {`,
    `    ${MOVE_FUNCTION} 1`,
    '}',
    '',
    ...adapter.keys.search.map(key => `bind -m emacs -x '"${key}": ${SEARCH_FUNCTION}'`),
    ...adapter.keys.previous.map(key => `bind -m emacs -x '"${key}": ${PREVIOUS_FUNCTION}'`),
    ...adapter.keys.next.map(key => `bind -m emacs -x '"${key}": ${NEXT_FUNCTION}'`),
  ]
  return [
    '# vellum-shell integration for bash',
    '# eval "$(vellum-shell init bash)"',
    ...guarded(parts, setup),
  ]
}

function renderZsh(parts: ScriptParts): string[] {
  const adapter = getAdapter('zsh')
  const setup = [
    `typeset -gr ${SETUP_SENTINEL}=1`,
    '',
    `${BACKEND_FUNCTION}() {`,
    `    ${parts.backend} "$@"`,
    '}',
    '',
    ...posixSession(parts),
    '',
    ...posixHooks(parts, true),
    '',
    `${SEARCH_FUNCTION}() {`,
    '    local selected',
    '    setopt localoptions noglobsubst noposixbuiltins pipefail no_aliases noglob nobash_rematch 2> /dev/null',
    `    selected="$(${parts.history} |`,
    `        FZF_DEFAULT_OPTS=$(__fzf_defaults "" "${parts.selectorOptions} \${FZF_CTRL_R_OPTS-} --query=\${(qqq)BUFFER} ${parts.selectorTail}") \\`,
    `        FZF_DEFAULT_OPTS_FILE='' $(__fzfcmd))"`,
    '    local ret=$?',
    '    if [[ -n "$selected" ]]; then',
    `        BUFFER="\${selected#*$'\\t'}"`,
    '        CURSOR=${#BUFFER}',
    `        ${CURSOR_VARIABLE}=""`,
    '    fi',
    '    zle reset-prompt',
    '    return $ret',
    '}',
    `zle -N ${SEARCH_FUNCTION}`,
    ...adapter.keys.search.map(key => `bindkey -M emacs ${quote(key, 'zsh')} ${SEARCH_FUNCTION}`),
    '',
    ...posixMove(parts, 'BUFFER', 'CURSOR'),
    '',
    // A multi-line buffer moves between its own lines
    `${PREVIOUS_FUNCTION}() {`,
    `    if [[ "$BUFFER" == *$'\\n'* ]]; then`,
    '        zle up-line',
    '    else',
    `        ${MOVE_FUNCTION} -1`,
    '    fi',
    '}',
    '',
    `${NEXT_FUNCTION}() {`,
    `    if [[ "$BUFFER" == *$'\\n'* ]]; then`,
    '        zle down-line',
    '    else',
    `        ${MOVE_FUNCTION} 1`,
    '    fi',
    '}',
    '',
    // zsh keys are the widgets the arrows are already bound to
    ...adapter.keys.previous.map(widget => `zle -N ${widget} ${PREVIOUS_FUNCTION}`),
    ...adapter.keys.next.map(widget => `zle -N ${widget} ${NEXT_FUNCTION}`),
  ]
  return [
    '# vellum-shell integration for zsh',
    '# eval "$(vellum-shell init zsh)"',
    ...guarded(parts, setup),
  ]
}

function renderFish(parts: ScriptParts): string[] {
  const adapter = getAdapter('fish')
  const setup = [
    `set -g ${SETUP_SENTINEL} 1`,
    '',
    `function ${BACKEND_FUNCTION}`,
    `    ${parts.backend} $argv`,
    'end',
    '',
    `if not set -q ${SESSION_VARIABLE}`,
    `    set -gx ${SESSION_VARIABLE} (${parts.initSession})`,
    ...(parts.recordStart ? [`    set -gx ${SESSION_START_VARIABLE} (${parts.initTimestamp})`] : []),
    'end',
    '',
    `function ${CAPTURE_HOOK} --on-event ${adapter.hooks.capture}`,
    `    ${parts.store} $argv[1]`,
    'end',
    '',
    `function ${RESET_HOOK} --on-event ${adapter.hooks.reset}`,
    `    set -g ${CURSOR_VARIABLE} ''`,
    'end',
    '',
    `function ${SEARCH_FUNCTION}`,
    `    set -l selected (${parts.history} | FZF_DEFAULT_OPTS="${FZF_BASE_OPTIONS.join(' ')} $FZF_DEFAULT_OPTS ${parts.selectorOptions} $FZF_CTRL_R_OPTS ${parts.selectorTail}" FZF_DEFAULT_OPTS_FILE='' ${parts.selector} --query (commandline | string collect) | string collect)`,
    '    if test -n "$selected"',
    '        set -l parts (string split -m 1 \\t -- $selected)',
    '        commandline -r -- $parts[-1]',
    '        commandline -C (string length -- $parts[-1])',
    `        set -g ${CURSOR_VARIABLE} ''`,
    '    end',
    '    commandline -f repaint',
    'end',
    '',
    `function ${MOVE_FUNCTION}`,
    '    set -l vellum_search',
    `    if test -z "$${CURSOR_VARIABLE}"`,
    '        set vellum_search "--prefix="(commandline | string collect)',
    '    end',
    `    set -l vellum_output (${parts.move} $vellum_search${moveArgs(parts)} -- $argv[1] "$${CURSOR_VARIABLE}" | string collect)`,
    `    string match -q '*|*' -- $vellum_output; or return`,
    `    set -l parts (string split -m 1 '|' -- $vellum_output)`,
    `    set -g ${CURSOR_VARIABLE} $parts[1]`,
    '    commandline -r -- $parts[2]',
    '    commandline -C (string length -- $parts[2])',
    'end',
    '',
    `function ${PREVIOUS_FUNCTION}`,
    '    if test (count (commandline)) -gt 1',
    '        commandline -f up-line',
    '    else',
    `        ${MOVE_FUNCTION} -1`,
    '    end',
    'end',
    '',
    `function ${NEXT_FUNCTION}`,
    '    if test (count (commandline)) -gt 1',
    '        commandline -f down-line',
    '    else',
    `        ${MOVE_FUNCTION} 1`,
    '    end',
    'end',
    '',
    ...adapter.keys.search.map(key => `bind ${key} ${SEARCH_FUNCTION}`),
    ...adapter.keys.previous.map(key => `bind ${key} ${PREVIOUS_FUNCTION}`),
    ...adapter.keys.next.map(key => `bind ${key} ${NEXT_FUNCTION}`),
  ]
  return [
    '# vellum-shell integration for fish',
    '# vellum-shell init fish | source',
    ...guarded(parts, setup),
  ]
}

const RENDERERS: Record<ScriptDialect, (parts: ScriptParts) => string[]> = {
  bash: renderBash,
  zsh: renderZsh,
  fish: renderFish,
}

/**
 * The setup script a shell sources to install the integration: the same
 * requirement checks, sentinel, session, hooks and key bindings as
 * `ShellIntegration.initialize`, in the dialect's own language. Settings are
 * fixed at the time the script is written.
 */
export function renderInitScript(dialect: ScriptDialect, config: VellumShellConfig = defaultConfig): string {
  return `${RENDERERS[dialect](scriptParts(dialect, config)).join('\n')}\n`
}
