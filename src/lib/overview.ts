import type { AiFailureReason, AiOverviewResult } from '@/lib/gemini'
import { heuristicOverview } from '@/lib/heuristic'
import type { Overview, SavedPage } from '@/types'

export interface AiOverviewGenerator {
  readonly configured: boolean
  generate(query: string, ranked: SavedPage[]): Promise<AiOverviewResult>
}

export type OverviewDecision = 'disabled' | 'no-key' | 'ai' | 'fallback'

export interface OverviewOutcome {
  overview: Overview
  decision: OverviewDecision
  fallbackReason?: AiFailureReason
}

export interface OverviewRequest {
  query: string
  ranked: SavedPage[]
  aiEnabled: boolean
}

/**
 * Picks the generator for one request: the explicit override first, then
 * whether a key is configured, then the outcome of the AI call itself. Any AI
 * failure falls back to the heuristic overview.
 */
export class OverviewOrchestrator {
  constructor(private ai: AiOverviewGenerator) {}

  async produce({ query, ranked, aiEnabled }: OverviewRequest): Promise<OverviewOutcome> {
    const heuristic = (): Overview => ({ text: heuristicOverview(query, ranked), source: 'heuristic' })

    if (!aiEnabled) {
      return { overview: heuristic(), decision: 'disabled' }
    }
    if (!this.ai.configured) {
      return { overview: heuristic(), decision: 'no-key' }
    }

    const result = await this.ai.generate(query, ranked)
    if (result.ok) {
      return { overview: { text: result.text, source: 'ai' }, decision: 'ai' }
    }

    console.warn(`[Overview] Falling back to heuristic (${result.reason}): ${result.message}`)
    return { overview: heuristic(), decision: 'fallback', fallbackReason: result.reason }
  }
}
