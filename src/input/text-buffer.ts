import type { LineBuffer } from '../host'
import type { Direction } from '../protocol/codec'

export function getLines(input: string): string[] {
  return input.split('\n')
}

export function indexToLineCol(input: string, index: number): { line: number, col: number } {
  const lines = getLines(input)
  let remaining = Math.max(0, Math.min(index, input.length))
  for (let i = 0; i < lines.length; i++) {
    const len = lines[i].length
    if (remaining <= len)
      return { line: i, col: remaining }
    remaining -= (len + 1)
  }
  return { line: lines.length - 1, col: (lines[lines.length - 1] ?? '').length }
}

export function lineColToIndex(input: string, line: number, col: number): number {
  const lines = getLines(input)
  const safeLine = Math.max(0, Math.min(line, lines.length - 1))
  let idx = 0
  for (let i = 0; i < safeLine; i++) idx += lines[i].length + 1
  const maxCol = (lines[safeLine] ?? '').length
  return idx + Math.max(0, Math.min(col, maxCol))
}

/**
 * The edit buffer of the line editor: text plus the point (cursor index).
 * Multi-line aware; no rendering.
 */
export class TextBuffer implements LineBuffer {
  private value = ''
  private point = 0

  get text(): string {
    return this.value
  }

  get cursor(): number {
    return this.point
  }

  replace(text: string): void {
    this.value = text
    this.point = text.length
  }

  clear(): void {
    this.replace('')
  }

  insert(chars: string): void {
    this.value = this.value.slice(0, this.point) + chars + this.value.slice(this.point)
    this.point += chars.length
  }

  deleteBackward(): void {
    if (this.point === 0)
      return
    this.value = this.value.slice(0, this.point - 1) + this.value.slice(this.point)
    this.point--
  }

  deleteForward(): void {
    if (this.point >= this.value.length)
      return
    this.value = this.value.slice(0, this.point) + this.value.slice(this.point + 1)
  }

  moveLeft(): void {
    if (this.point > 0)
      this.point--
  }

  moveRight(): void {
    if (this.point < this.value.length)
      this.point++
  }

  moveToLineStart(): void {
    const { line } = indexToLineCol(this.value, this.point)
    this.point = lineColToIndex(this.value, line, 0)
  }

  moveToLineEnd(): void {
    const { line } = indexToLineCol(this.value, this.point)
    this.point = lineColToIndex(this.value, line, Number.POSITIVE_INFINITY)
  }

  // Ctrl-U: delete from the start of the current line to the point
  killToLineStart(): void {
    const end = this.point
    this.moveToLineStart()
    this.value = this.value.slice(0, this.point) + this.value.slice(end)
  }

  // Ctrl-K: delete from the point to the end of the current line
  killToLineEnd(): void {
    const { line } = indexToLineCol(this.value, this.point)
    const end = lineColToIndex(this.value, line, Number.POSITIVE_INFINITY)
    this.value = this.value.slice(0, this.point) + this.value.slice(end)
  }

  moveLine(direction: Direction): void {
    const { line, col } = indexToLineCol(this.value, this.point)
    const target = line + direction
    if (target < 0 || target >= getLines(this.value).length)
      return
    this.point = lineColToIndex(this.value, target, col)
  }
}
