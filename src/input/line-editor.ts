import type { Key } from 'node:readline'
import type { Widget } from '../host'
import type { Logger } from '../logger'
import process from 'node:process'
import { emitKeypressEvents } from 'node:readline'
import { renderFrame } from './render'
import { TextBuffer } from './text-buffer'

export type EditorInput = NodeJS.ReadableStream & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export interface EditorOutput {
  write: (chunk: string) => unknown
}

export interface LineEditorOptions {
  input?: EditorInput
  output?: EditorOutput
  log?: Logger
}

// Key names as bindings see them: `up`, `ctrl+r`, `meta+b`
export function keyName(key: Key): string {
  return `${key.ctrl ? 'ctrl+' : ''}${key.meta ? 'meta+' : ''}${key.name ?? key.sequence ?? ''}`
}

/**
 * Raw-mode line editor over keypress events. Widgets bound to key names take
 * precedence over the built-in editing keys; while one runs the terminal is
 * handed back so an external program can use it.
 */
export class LineEditor {
  private input: EditorInput
  private output: EditorOutput
  private log?: Logger
  private bindings = new Map<string, Widget>()

  constructor(options: LineEditorOptions = {}) {
    this.input = options.input ?? process.stdin
    this.output = options.output ?? process.stdout
    this.log = options.log
    emitKeypressEvents(this.input)
  }

  bind(name: string, widget: Widget): void {
    this.bindings.set(name, widget)
  }

  /**
   * Read one line. Resolves with the submitted text (possibly multi-line),
   * an empty string when the line is discarded with Ctrl-C, or null at end
   * of input.
   */
  readLine(prompt: string): Promise<string | null> {
    return new Promise((resolve) => {
      const buffer = new TextBuffer()
      let cursorRow = 0
      let busy = false

      const draw = () => {
        const frame = renderFrame(prompt, buffer.text, buffer.cursor, cursorRow)
        cursorRow = frame.cursorRow
        this.output.write(frame.output)
      }

      const attach = () => {
        this.input.setRawMode?.(true)
        this.input.resume()
        this.input.on('keypress', handleKeypress)
      }

      const detach = () => {
        this.input.removeListener('keypress', handleKeypress)
        this.input.setRawMode?.(false)
        this.input.pause()
      }

      const finish = (value: string | null) => {
        detach()
        // Leave the cursor below the whole buffer
        const frame = renderFrame(prompt, buffer.text, buffer.text.length, cursorRow)
        this.output.write(`${frame.output}\r\n`)
        resolve(value)
      }

      const runWidget = async (widget: Widget) => {
        busy = true
        detach()
        try {
          const status = await widget(buffer)
          this.log?.debug(`widget returned ${status}`)
        }
        catch (error) {
          this.log?.debug('widget failed:', error)
        }
        finally {
          busy = false
          attach()
          draw()
        }
      }

      const handleKeypress = (str: string | undefined, key: Key | undefined) => {
        if (busy || !key)
          return

        const name = keyName(key)
        const widget = this.bindings.get(name)
        if (widget) {
          void runWidget(widget)
          return
        }

        switch (name) {
          case 'ctrl+c':
            buffer.clear()
            finish('')
            return
          case 'ctrl+d':
            if (!buffer.text) {
              finish(null)
              return
            }
            buffer.deleteForward()
            break
          case 'return':
            finish(buffer.text)
            return
          // Ctrl-J arrives as a bare line feed
          case 'enter':
          case 'ctrl+j':
            buffer.insert('\n')
            break
          case 'backspace':
            buffer.deleteBackward()
            break
          case 'delete':
            buffer.deleteForward()
            break
          case 'left':
            buffer.moveLeft()
            break
          case 'right':
            buffer.moveRight()
            break
          case 'up':
            buffer.moveLine(-1)
            break
          case 'down':
            buffer.moveLine(1)
            break
          case 'home':
          case 'ctrl+a':
            buffer.moveToLineStart()
            break
          case 'end':
          case 'ctrl+e':
            buffer.moveToLineEnd()
            break
          case 'ctrl+u':
            buffer.killToLineStart()
            break
          case 'ctrl+k':
            buffer.killToLineEnd()
            break
          default:
            if (!str || key.ctrl || key.meta || str < ' ')
              return
            buffer.insert(str)
        }
        draw()
      }

      attach()
      draw()
    })
  }
}
