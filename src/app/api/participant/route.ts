import { NextResponse, type NextRequest } from 'next/server'
import { PARTICIPANT_COOKIE, PARTICIPANT_COOKIE_MAX_AGE } from '@/lib/admin'
import { formString, seeOther } from '@/lib/request'

export async function POST(request: NextRequest) {
  const form = await request.formData().catch(() => null)
  if (!form) {
    return NextResponse.json({ error: 'Invalid form body' }, { status: 400 })
  }
  const participantId = formString(form, 'participant_id')

  const response = seeOther(request, '/results')
  if (participantId) {
    response.cookies.set(PARTICIPANT_COOKIE, participantId, {
      maxAge: PARTICIPANT_COOKIE_MAX_AGE,
      httpOnly: false,
      sameSite: 'lax',
      path: '/',
    })
  }
  return response
}
