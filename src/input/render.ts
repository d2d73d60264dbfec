import { getLines, indexToLineCol } from './text-buffer'

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1B\[[0-9;]*[A-Za-z]/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, '')
}

export function visibleLength(text: string): number {
  return stripAnsi(text).length
}

export interface Frame {
  output: string
  /** Row of the cursor relative to the prompt row, needed to erase this frame */
  cursorRow: number
}

/**
 * Escape sequences that erase the previous frame and draw prompt and buffer
 * again, leaving the terminal cursor at the point. Rows after the first start
 * in column 0. Lines wider than the terminal are not accounted for.
 */
export function renderFrame(prompt: string, text: string, point: number, previousCursorRow = 0): Frame {
  let output = '\r'
  if (previousCursorRow > 0)
    output += `\x1B[${previousCursorRow}A`
  output += '\x1B[J'

  const lines = getLines(text)
  output += prompt + lines.join('\r\n')

  const { line, col } = indexToLineCol(text, point)
  const rowsBelow = lines.length - 1 - line
  if (rowsBelow > 0)
    output += `\x1B[${rowsBelow}A`

  const column = line === 0 ? visibleLength(prompt) + col : col
  output += `\x1B[${column + 1}G`

  return { output, cursorRow: line }
}
