import path from 'path'
import fs from 'fs-extra'
import { cleanField, formatCsv, formatCsvRow, parseCsv, type CsvRow } from '@/lib/csv'
import type { OverviewSource } from '@/types'

export type LogKind = 'events' | 'submissions'

export const LOG_KINDS: readonly LogKind[] = ['events', 'submissions']

export function isLogKind(value: string): value is LogKind {
  return LOG_KINDS.some(kind => kind === value)
}

export const EVENT_HEADER: CsvRow = [
  'timestamp',
  'participant_id',
  'type',
  'query',
  'target',
  'sources',
  'overview',
  'overview_source',
  'group',
]

export const SUBMISSION_HEADER: CsvRow = ['timestamp', 'participant_id', 'query', 'word_count', 'text']

const HEADERS: Record<LogKind, CsvRow> = {
  events: EVENT_HEADER,
  submissions: SUBMISSION_HEADER,
}

export type EventType = 'overview' | 'click' | 'submit'

export interface EventEntry {
  participantId: string
  group: number
  type: EventType
  query?: string
  target?: string
  sources?: string[]
  overview?: string
  overviewSource?: OverviewSource
}

export interface SubmissionEntry {
  participantId: string
  query: string
  text: string
}

const pad = (n: number) => String(n).padStart(2, '0')

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/** `1:a.html;2:b.html` */
export function formatSources(sources: string[]): string {
  return sources.map((name, i) => `${i + 1}:${name}`).join(';')
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

function sameRow(a: CsvRow, b: CsvRow): boolean {
  return a.length === b.length && a.every((field, i) => field === b[i])
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/** Append-only CSV logs kept under the configured logs directory. */
export class EventLog {
  private headerChecks = new Map<LogKind, Promise<void>>()

  constructor(
    private logsDir: string,
    private now: () => Date = () => new Date()
  ) {}

  filePath(kind: LogKind): string {
    return path.join(this.logsDir, `${kind}.csv`)
  }

  /**
   * Creates the file with its header when missing. An events file written
   * with an older header is rewritten once per instance, with each row
   * padded or cut to fit.
   */
  async ensure(kind: LogKind): Promise<string> {
    const file = this.filePath(kind)
    const created = await this.create(file, HEADERS[kind])
    if (kind !== 'events') {
      return file
    }

    let check = this.headerChecks.get(kind)
    if (!check) {
      check = created ? Promise.resolve() : this.upgradeHeader(file, HEADERS[kind])
      this.headerChecks.set(kind, check)
    }
    try {
      await check
    } catch (error) {
      this.headerChecks.delete(kind)
      throw error
    }
    return file
  }

  private async create(file: string, header: CsvRow): Promise<boolean> {
    await fs.ensureDir(path.dirname(file))
    try {
      await fs.writeFile(file, formatCsvRow(header), { encoding: 'utf8', flag: 'wx' })
      return true
    } catch (error) {
      if (hasCode(error, 'EEXIST')) return false
      throw error
    }
  }

  private async upgradeHeader(file: string, header: CsvRow): Promise<void> {
    const rows = parseCsv(await fs.readFile(file, 'utf8'))
    if (rows.length === 0 || sameRow(rows[0], header)) return

    console.log(`[EventLog] Upgrading header of ${file}`)
    const upgraded = rows.slice(1).map(row =>
      [...row, ...Array<string>(Math.max(0, header.length - row.length)).fill('')].slice(0, header.length)
    )
    await fs.outputFile(file, formatCsv([header, ...upgraded]), 'utf8')
  }

  async recordEvent(entry: EventEntry): Promise<void> {
    const file = await this.ensure('events')
    const row: CsvRow = [
      formatTimestamp(this.now()),
      entry.participantId,
      entry.type,
      cleanField(entry.query, 4000),
      cleanField(entry.target, 4000),
      cleanField(entry.sources ? formatSources(entry.sources) : '', 8000),
      cleanField(entry.overview, 16000),
      entry.overviewSource ?? '',
      String(entry.group),
    ]
    await fs.appendFile(file, formatCsvRow(row), 'utf8')
  }

  async recordSubmission(entry: SubmissionEntry): Promise<void> {
    const file = await this.ensure('submissions')
    const row: CsvRow = [
      formatTimestamp(this.now()),
      entry.participantId,
      cleanField(entry.query, 2000),
      String(countWords(entry.text)),
      entry.text,
    ]
    await fs.appendFile(file, formatCsvRow(row), 'utf8')
  }

  /** All rows, header first; an empty list when the file does not exist yet. */
  async read(kind: LogKind): Promise<CsvRow[]> {
    const file = this.filePath(kind)
    if (!(await fs.pathExists(file))) return []
    return parseCsv(await fs.readFile(file, 'utf8'))
  }

  async clear(kind: LogKind): Promise<void> {
    await fs.outputFile(this.filePath(kind), formatCsvRow(HEADERS[kind]), 'utf8')
  }
}

/** Log writes never fail the request that triggered them. */
export async function bestEffort(label: string, task: () => Promise<void>): Promise<void> {
  try {
    await task()
  } catch (error) {
    console.error(`[EventLog] Failed to ${label}:`, error)
  }
}
