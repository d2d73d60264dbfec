import { describe, expect, it } from 'vitest'
import { indexToLineCol, lineColToIndex, TextBuffer } from '../src/input/text-buffer'

function bufferWith(text: string): TextBuffer {
  const buffer = new TextBuffer()
  buffer.replace(text)
  return buffer
}

describe('line and column mapping', () => {
  it('maps indexes to lines and back', () => {
    expect(indexToLineCol('abc\nde', 0)).toEqual({ line: 0, col: 0 })
    expect(indexToLineCol('abc\nde', 3)).toEqual({ line: 0, col: 3 })
    expect(indexToLineCol('abc\nde', 4)).toEqual({ line: 1, col: 0 })
    expect(lineColToIndex('abc\nde', 1, 2)).toBe(6)
  })

  it('clamps columns past the end of a line', () => {
    expect(lineColToIndex('abc\nde', 1, 10)).toBe(6)
    expect(lineColToIndex('abc\nde', 0, Number.POSITIVE_INFINITY)).toBe(3)
  })
})

describe('TextBuffer', () => {
  it('inserts at the point', () => {
    const buffer = bufferWith('gt')
    buffer.moveLeft()
    buffer.insert('i')
    expect(buffer.text).toBe('git')
    expect(buffer.cursor).toBe(2)
  })

  it('deletes around the point', () => {
    const buffer = bufferWith('abcd')
    buffer.moveLeft()
    buffer.deleteBackward()
    expect(buffer.text).toBe('abd')
    buffer.deleteForward()
    expect(buffer.text).toBe('ab')
    buffer.deleteForward()
    expect(buffer.text).toBe('ab')
  })

  it('puts the point at the end on replace', () => {
    const buffer = bufferWith('x')
    buffer.replace('git commit')
    expect(buffer.cursor).toBe(10)
  })

  it('moves between lines keeping the column', () => {
    const buffer = bufferWith('abc\nde')
    buffer.moveLine(-1)
    expect(buffer.cursor).toBe(2)
    buffer.moveLine(-1)
    expect(buffer.cursor).toBe(2)
    buffer.moveLine(1)
    expect(buffer.cursor).toBe(6)
    buffer.moveLine(1)
    expect(buffer.cursor).toBe(6)
  })

  it('stays put on a single line', () => {
    const buffer = bufferWith('ls')
    buffer.moveLine(-1)
    expect(buffer.cursor).toBe(2)
    expect(buffer.text).toBe('ls')
  })

  it('moves to the start and end of the current line', () => {
    const buffer = bufferWith('abc\nde')
    buffer.moveToLineStart()
    expect(buffer.cursor).toBe(4)
    buffer.moveLine(-1)
    buffer.moveToLineEnd()
    expect(buffer.cursor).toBe(3)
  })

  it('kills to the start and end of the current line', () => {
    const buffer = bufferWith('abc\nde')
    buffer.killToLineStart()
    expect(buffer.text).toBe('abc\n')
    expect(buffer.cursor).toBe(4)

    const other = bufferWith('abc\nde')
    other.moveLine(-1)
    other.moveToLineStart()
    other.moveRight()
    other.killToLineEnd()
    expect(other.text).toBe('a\nde')
    expect(other.cursor).toBe(1)
  })

  it('clears', () => {
    const buffer = bufferWith('abc')
    buffer.clear()
    expect(buffer.text).toBe('')
    expect(buffer.cursor).toBe(0)
  })
})
