import type { AppConfig } from '@/lib/config'
import { bestEffort, type EventLog } from '@/lib/event-log'
import type { OverviewDecision, OverviewOrchestrator } from '@/lib/overview'
import { chooseCorpus, loadPages, rankPages } from '@/lib/pages'
import type { Citation, CorpusName, Overview } from '@/types'

export interface SearchRequest {
  query: string
  participantId: string
  aiEnabled: boolean
}

export interface SearchResult {
  query: string
  overview: Overview | null
  decision: OverviewDecision | null
  citations: Citation[]
  corpus: CorpusName
  group: number
  candidates: number
}

/** `ai=0` (or `false` / `off`) disables the AI overview; anything else keeps it. */
export function parseAiFlag(value: string | number | boolean | null | undefined): boolean {
  if (value === undefined || value === null) return true
  if (typeof value === 'boolean') return value
  const normalized = String(value).trim().toLowerCase()
  return !['0', 'false', 'off'].includes(normalized)
}

export function clickHref(corpus: CorpusName, name: string, query: string): string {
  const params = new URLSearchParams({ corpus, name, q: query })
  return `/out?${params}`
}

type SearchSettings = Pick<AppConfig, 'pagesDir' | 'maxPages' | 'maxSources'>

export class SearchService {
  constructor(
    private settings: SearchSettings,
    private orchestrator: OverviewOrchestrator,
    private eventLog: EventLog
  ) {}

  async search({ query, participantId, aiEnabled }: SearchRequest): Promise<SearchResult> {
    const q = query.trim()
    const { corpus, group } = chooseCorpus(participantId)
    if (!q) {
      return { query: q, overview: null, decision: null, citations: [], corpus, group, candidates: 0 }
    }

    const pages = await loadPages(this.settings.pagesDir, corpus, this.settings.maxPages)
    const ranked = rankPages(pages, q, this.settings.maxSources)
    const { overview, decision } = await this.orchestrator.produce({ query: q, ranked, aiEnabled })

    const citations = ranked.map((page, i) => ({
      index: i + 1,
      title: page.title || page.name || `Source ${i + 1}`,
      href: clickHref(page.corpus, page.name, q),
    }))

    console.log(`[Search] "${q}" → ${overview.source} overview (${decision}), ${ranked.length}/${pages.length} sources`)

    await bestEffort('record overview event', () =>
      this.eventLog.recordEvent({
        participantId,
        group,
        type: 'overview',
        query: q,
        target: `${pages.length} candidates from ${corpus}`,
        sources: ranked.map(page => page.name),
        overview: overview.text,
        overviewSource: overview.source,
      })
    )

    return { query: q, overview, decision, citations, corpus, group, candidates: pages.length }
  }
}
