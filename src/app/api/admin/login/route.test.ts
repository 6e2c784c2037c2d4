import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { adminToken } from '@/lib/admin'
import type { Services } from '@/lib/services'
import { createTestServices, formRequest, jsonRequest, textRequest, type TestServices } from '@/test/services'
import { POST } from './route'

const holder = vi.hoisted(() => {
  const current: { services?: Services } = {}
  return current
})

vi.mock('@/lib/services', async importOriginal => ({
  ...(await importOriginal<typeof import('@/lib/services')>()),
  getServices: () => {
    if (!holder.services) throw new Error('services not prepared')
    return holder.services
  },
}))

const ENDPOINT = 'http://localhost/api/admin/login'

describe('POST /api/admin/login', () => {
  let env: TestServices

  beforeEach(async () => {
    env = await createTestServices()
    holder.services = env.services
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    holder.services = undefined
    await env.cleanup()
  })

  it('grants access with the configured password', async () => {
    const response = await POST(formRequest(ENDPOINT, { password: ' test-secret ', next: '/admin/submissions' }))

    expect(response.status).toBe(303)
    expect(response.headers.get('location')).toBe('http://localhost/admin/submissions')
    expect(response.cookies.get('admin_access')?.value).toBe(await adminToken('test-secret'))
  })

  it('sends a wrong password back to the login form', async () => {
    const response = await POST(formRequest(ENDPOINT, { password: 'guess' }))

    expect(response.status).toBe(303)
    expect(response.headers.get('location')).toBe('http://localhost/admin/login?error=1&next=%2Fadmin%2Fevents')
    expect(response.cookies.get('admin_access')).toBeUndefined()
  })

  it('ignores redirect targets outside the site', async () => {
    const response = await POST(formRequest(ENDPOINT, { password: 'test-secret', next: '//evil.example' }))

    expect(response.headers.get('location')).toBe('http://localhost/admin/events')
  })

  it('ignores targets that a backslash turns into another host', async () => {
    const response = await POST(formRequest(ENDPOINT, { password: 'test-secret', next: '/\\evil.example/x' }))

    expect(response.headers.get('location')).toBe('http://localhost/admin/events')
  })

  it('rejects bodies that are neither JSON nor a form', async () => {
    const response = await POST(textRequest(ENDPOINT, 'password=test-secret'))

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ error: 'Invalid form body' })
    expect(response.cookies.get('admin_access')).toBeUndefined()
  })

  it('answers JSON logins', async () => {
    const ok = await POST(jsonRequest(ENDPOINT, { password: 'test-secret' }))
    expect(ok.status).toBe(200)
    expect(await ok.json()).toEqual({ ok: true, next: '/admin/events' })
    expect(ok.cookies.get('admin_access')?.value).toBe(await adminToken('test-secret'))

    const denied = await POST(jsonRequest(ENDPOINT, { password: 'gour' }))
    expect(denied.status).toBe(401)
    expect(await denied.json()).toEqual({ error: 'Wrong password.' })
  })
})
