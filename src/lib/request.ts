import { NextResponse, type NextRequest } from 'next/server'
import { PARTICIPANT_COOKIE } from '@/lib/admin'

export function participantIdOf(req: NextRequest): string {
  return req.cookies.get(PARTICIPANT_COOKIE)?.value.trim() ?? ''
}

export function formString(form: FormData, key: string): string {
  const value = form.get(key)
  return typeof value === 'string' ? value.trim() : ''
}

// 303 so the browser follows a form POST with a GET
export function seeOther(req: NextRequest, path: string): NextResponse {
  return NextResponse.redirect(new URL(path, req.url), 303)
}
