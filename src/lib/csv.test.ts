import { describe, expect, it } from 'vitest'
import { cleanField, formatCsv, formatCsvRow, parseCsv } from '@/lib/csv'

describe('formatCsvRow', () => {
  it('quotes fields that need it', () => {
    expect(formatCsvRow(['plain', 'a,b', 'say "hi"', 'two\nlines'])).toBe(
      'plain,"a,b","say ""hi""","two\nlines"\r\n'
    )
  })
})

describe('parseCsv', () => {
  it('reads what the writer wrote', () => {
    const rows = [
      ['timestamp', 'text'],
      ['2024-01-01 10:00:00', 'a, "quoted"\nvalue'],
      ['', ''],
    ]
    expect(parseCsv(formatCsv(rows))).toEqual(rows)
  })

  it('accepts LF line endings and skips blank lines', () => {
    expect(parseCsv('a,b\n\n1,2\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ])
  })

  it('keeps the last row without a trailing newline', () => {
    expect(parseCsv('a,b\r\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ])
  })
})

describe('cleanField', () => {
  it('flattens, trims and cuts', () => {
    expect(cleanField(' one\r\ntwo ', 100)).toBe('one  two')
    expect(cleanField('abcdef', 3)).toBe('abc')
    expect(cleanField(undefined)).toBe('')
  })
})
