export type CsvRow = string[]

function escapeField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field
}

export function formatCsvRow(row: CsvRow): string {
  return row.map(escapeField).join(',') + '\r\n'
}

export function formatCsv(rows: CsvRow[]): string {
  return rows.map(formatCsvRow).join('')
}

/** Parses quoted fields (with doubled quotes and embedded newlines); skips blank lines. */
export function parseCsv(content: string): CsvRow[] {
  const rows: CsvRow[] = []
  let row: CsvRow = []
  let field = ''
  let quoted = false
  let touched = false

  const endField = () => {
    row.push(field)
    field = ''
  }
  const endRow = () => {
    endField()
    if (touched) rows.push(row)
    row = []
    touched = false
  }

  for (let i = 0; i < content.length; i++) {
    const ch = content[i]
    if (quoted) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        field += ch
      }
      continue
    }

    if (ch === '"') {
      quoted = true
      touched = true
    } else if (ch === ',') {
      endField()
      touched = true
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++
      endRow()
    } else {
      field += ch
      touched = true
    }
  }
  if (touched || field) endRow()

  return rows
}

/** Single-line, trimmed, cut to `limit` characters. */
export function cleanField(value: string | null | undefined, limit = 4096): string {
  return (value ?? '').replace(/[\r\n]/g, ' ').trim().slice(0, limit)
}
