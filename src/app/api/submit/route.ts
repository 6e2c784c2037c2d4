import { NextResponse, type NextRequest } from 'next/server'
import { bestEffort, countWords } from '@/lib/event-log'
import { chooseCorpus } from '@/lib/pages'
import { formString, participantIdOf, seeOther } from '@/lib/request'
import { getServices } from '@/lib/services'

export const runtime = 'nodejs'

export async function POST(request: NextRequest) {
  const form = await request.formData().catch(() => null)
  if (!form) {
    return NextResponse.json({ error: 'Invalid form body' }, { status: 400 })
  }
  const text = formString(form, 'conclusion') || formString(form, 'text')
  const query = formString(form, 'q')
  const participantId = participantIdOf(request)

  const { eventLog } = getServices()
  await bestEffort('record submission', () => eventLog.recordSubmission({ participantId, query, text }))
  await bestEffort('record submit event', () =>
    eventLog.recordEvent({
      participantId,
      group: chooseCorpus(participantId).group,
      type: 'submit',
      query,
      target: `${countWords(text)} words`,
    })
  )

  return seeOther(request, '/thanks')
}
