import { NextResponse, type NextRequest } from 'next/server'
import { z } from 'zod'
import {
  ADMIN_COOKIE,
  ADMIN_COOKIE_MAX_AGE,
  adminToken,
  checkAdminPassword,
  safeNext,
} from '@/lib/admin'
import { formString, seeOther } from '@/lib/request'
import { getServices } from '@/lib/services'

export const runtime = 'nodejs'

const loginBody = z.object({
  password: z.string().default(''),
  next: z.string().optional(),
})

export async function POST(request: NextRequest) {
  const isJson = request.headers.get('content-type')?.includes('application/json') ?? false

  let password = ''
  let next: string | undefined
  if (isJson) {
    const body = loginBody.safeParse(await request.json().catch(() => null))
    if (!body.success) {
      return NextResponse.json({ error: 'Invalid login request' }, { status: 400 })
    }
    password = body.data.password
    next = body.data.next
  } else {
    const form = await request.formData().catch(() => null)
    if (!form) {
      return NextResponse.json({ error: 'Invalid form body' }, { status: 400 })
    }
    password = formString(form, 'password')
    next = formString(form, 'next')
  }

  const target = safeNext(next)
  const { config } = getServices()

  if (!checkAdminPassword(password, config.adminPassword)) {
    console.warn('[Admin] Rejected login attempt')
    if (isJson) {
      return NextResponse.json({ error: 'Wrong password.' }, { status: 401 })
    }
    const params = new URLSearchParams({ error: '1', next: target })
    return seeOther(request, `/admin/login?${params}`)
  }

  const response = isJson ? NextResponse.json({ ok: true, next: target }) : seeOther(request, target)
  response.cookies.set(ADMIN_COOKIE, await adminToken(config.adminPassword), {
    maxAge: ADMIN_COOKIE_MAX_AGE,
    httpOnly: true,
    sameSite: 'lax',
    path: '/',
  })
  return response
}
