import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { ADMIN_COOKIE, isAdminCookie, resolveAdminPassword } from '@/lib/admin'

// Admin paths reachable without the admin cookie
const publicAdminPaths = ['/admin/login', '/api/admin/login']

export async function middleware(req: NextRequest) {
  const path = req.nextUrl.pathname

  if (publicAdminPaths.includes(path)) {
    return NextResponse.next()
  }

  const password = resolveAdminPassword(process.env.ADMIN_PASSWORD)
  if (await isAdminCookie(req.cookies.get(ADMIN_COOKIE)?.value, password)) {
    return NextResponse.next()
  }

  if (path.startsWith('/api/')) {
    return NextResponse.json({ error: 'Admin access required' }, { status: 401 })
  }

  const redirectUrl = new URL('/admin/login', req.url)
  redirectUrl.searchParams.set('next', path)
  return NextResponse.redirect(redirectUrl)
}

export const config = {
  matcher: ['/admin/:path*', '/api/admin/:path*'],
}
