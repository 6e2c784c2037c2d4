import type { NextRequest } from 'next/server'
import { NextResponse } from 'next/server'
import { bestEffort } from '@/lib/event-log'
import { chooseCorpus } from '@/lib/pages'
import { participantIdOf } from '@/lib/request'
import { getServices } from '@/lib/services'
import { isCorpusName } from '@/types'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

// Logs a citation click, then sends the participant to the saved copy of the page
export async function GET(request: NextRequest) {
  const params = request.nextUrl.searchParams
  const corpus = params.get('corpus')?.trim() ?? ''
  const name = params.get('name')?.trim() ?? ''
  const query = params.get('q')?.trim() ?? ''
  const target = name.endsWith('.html') ? name : ''

  const participantId = participantIdOf(request)
  const { eventLog } = getServices()
  await bestEffort('record click event', () =>
    eventLog.recordEvent({
      participantId,
      group: chooseCorpus(participantId).group,
      type: 'click',
      query,
      target: target || `${corpus}/${name}`,
    })
  )

  if (!isCorpusName(corpus) || !target) {
    return NextResponse.redirect(new URL('/results', request.url))
  }
  const savedUrl = new URL('/saved', request.url)
  savedUrl.searchParams.set('corpus', corpus)
  savedUrl.searchParams.set('name', target)
  return NextResponse.redirect(savedUrl)
}
