import type { SavedPage } from '@/types'

const MAX_SNIPPET_CHARS = 3000

export const OVERVIEW_INSTRUCTIONS =
  'INSTRUCTIONS:\n' +
  'Act as the AI overview generator of a web search engine, which summarizes the search results shown below the overview. ' +
  'Answer the query in one paragraph based on the sources provided. For each factual sentence, append inline citation(s)\n' +
  'like [1] or [2][5]. Avoid markdown headings, bullet lists, disclaimers.\n'

export function snippetOf(text: string): string {
  const snippet = text.replace(/\s+/g, ' ').trim()
  return snippet.length > MAX_SNIPPET_CHARS ? `${snippet.slice(0, MAX_SNIPPET_CHARS)}…` : snippet
}

export function buildOverviewPrompt(query: string, ranked: SavedPage[]): string {
  const sources = ranked
    .map((page, i) => `[${i + 1}] ${page.title || page.name || `Source ${i + 1}`}\n${snippetOf(page.text)}`)
    .join('\n\n')

  return `QUERY:\n${query}\n\nSOURCES:\n${sources}\n\n${OVERVIEW_INSTRUCTIONS}`
}
