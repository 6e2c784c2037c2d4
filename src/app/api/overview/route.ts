import { NextResponse, type NextRequest } from 'next/server'
import { z } from 'zod'
import { participantIdOf } from '@/lib/request'
import { parseAiFlag } from '@/lib/search'
import { getServices } from '@/lib/services'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const overviewBody = z.object({
  q: z.string().optional().default(''),
  ai: z.union([z.boolean(), z.number(), z.string()]).optional(),
})

export async function POST(request: NextRequest) {
  const body = overviewBody.safeParse(await request.json().catch(() => null))
  if (!body.success || !body.data.q.trim()) {
    return NextResponse.json({ error: 'missing query' }, { status: 400 })
  }

  try {
    const { search } = getServices()
    const result = await search.search({
      query: body.data.q,
      participantId: participantIdOf(request),
      aiEnabled: parseAiFlag(body.data.ai),
    })

    return NextResponse.json({
      overview: result.overview,
      decision: result.decision,
      citations: result.citations,
      candidates: result.candidates,
      corpus: result.corpus,
    })
  } catch (error) {
    console.error('Overview error:', error)
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'An unexpected error occurred' },
      { status: 500 }
    )
  }
}
