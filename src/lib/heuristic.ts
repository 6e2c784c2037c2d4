import type { SavedPage } from '@/types'

const MAX_CITED_TITLES = 4

export const NO_CONTENT_OVERVIEW = 'No relevant content found.'

// Saved titles often read "Article | Site name"
function shortTitle(page: SavedPage): string {
  const title = page.title || page.name || 'source'
  return title.split(' | ')[0]
}

/**
 * Local, network-free overview: the leading titles of the ranked pages
 * stitched into one sentence with their citation markers.
 */
export function heuristicOverview(query: string, ranked: SavedPage[]): string {
  const parts = ranked
    .slice(0, MAX_CITED_TITLES)
    .map((page, i) => `${shortTitle(page)} [${i + 1}]`)

  if (parts.length === 0 || !query.trim()) {
    return NO_CONTENT_OVERVIEW
  }
  return `${parts.join('; ')}.`
}
