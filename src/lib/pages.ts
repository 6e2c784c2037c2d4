import path from 'path'
import fs from 'fs-extra'
import { orderBy } from 'lodash-es'
import pLimit from 'p-limit'
import type { CorpusName, SavedPage } from '@/types'

// Saved pages read in parallel
const READ_CONCURRENCY = 8

export interface CorpusChoice {
  group: 1 | 2
  corpus: CorpusName
}

/**
 * Participants whose id ends in an odd digit (or has no digit at all) read
 * `webpages`; an even last digit selects `webpages2`.
 */
export function chooseCorpus(participantId: string): CorpusChoice {
  const digits = participantId.match(/\d/g)
  if (!digits) {
    return { group: 1, corpus: 'webpages' }
  }
  const last = Number(digits[digits.length - 1])
  return last % 2 === 1 ? { group: 1, corpus: 'webpages' } : { group: 2, corpus: 'webpages2' }
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X'
        ? parseInt(entity.slice(2), 16)
        : parseInt(entity.slice(1), 10)
      return Number.isFinite(code) ? String.fromCodePoint(code) : match
    }
    return ENTITIES[entity.toLowerCase()] ?? match
  })
}

function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]*>/g, ' ')).replace(/\s+/g, ' ').trim()
}

/**
 * Pulls the title (`<title>`, then the first `<h1>`, then the file name) and
 * the visible text out of a saved HTML page.
 */
export function extractPage(html: string, name: string, corpus: CorpusName): SavedPage {
  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)
  const h1Match = html.match(/<h1[^>]*>([\s\S]*?)<\/h1>/i)
  const title =
    (titleMatch && stripTags(titleMatch[1])) ||
    (h1Match && stripTags(h1Match[1])) ||
    name

  const body = html
    .replace(/<(script|style|noscript|title)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<head\b[^>]*>[\s\S]*?<\/head>/i, ' ')

  return { title, text: stripTags(body), name, corpus }
}

/** Unreadable entries come back with the file name as title and no text. */
export async function loadPages(
  pagesDir: string,
  corpus: CorpusName,
  limit: number
): Promise<SavedPage[]> {
  const dir = path.join(pagesDir, corpus)
  if (!(await fs.pathExists(dir))) {
    console.warn(`[Pages] Corpus directory not found: ${dir}`)
    return []
  }

  const files = (await fs.readdir(dir))
    .filter(file => file.endsWith('.html'))
    .sort()
    .slice(0, limit)

  const limitRead = pLimit(READ_CONCURRENCY)
  return Promise.all(
    files.map(file =>
      limitRead(async (): Promise<SavedPage> => {
        try {
          const html = await fs.readFile(path.join(dir, file), 'utf8')
          return extractPage(html, file, corpus)
        } catch (error) {
          console.warn(`[Pages] Could not read ${file}:`, error)
          return { title: file, text: '', name: file, corpus }
        }
      })
    )
  )
}

/** Query words that take part in scoring: longer than two characters, lowercased. */
export function queryWords(query: string): string[] {
  return (query.match(/[\p{L}\p{N}_]+/gu) || [])
    .filter(word => word.length > 2)
    .map(word => word.toLowerCase())
}

export function scoreQuery(text: string, query: string): number {
  if (!text || !query) return 0
  const words = queryWords(query)
  if (words.length === 0) return 0

  const lower = text.toLowerCase()
  return words.reduce((total, word) => total + (lower.split(word).length - 1), 0)
}

/** Highest score first; equal scores keep corpus order. */
export function rankPages(pages: SavedPage[], query: string, maxSources: number): SavedPage[] {
  const scored = pages.map((page, position) => ({
    page,
    position,
    score: scoreQuery(page.text, query),
  }))
  return orderBy(scored, ['score', 'position'], ['desc', 'asc'])
    .slice(0, maxSources)
    .map(entry => entry.page)
}

export function resolveSavedPath(pagesDir: string, corpus: CorpusName, name: string): string | null {
  if (!name || name.includes('/') || name.includes('\\') || !name.endsWith('.html')) {
    return null
  }
  return path.join(pagesDir, corpus, name)
}
