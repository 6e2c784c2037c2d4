// Shared by the middleware, so nothing here may touch the file system.

export const ADMIN_COOKIE = 'admin_access'
export const ADMIN_COOKIE_MAX_AGE = 24 * 3600
export const PARTICIPANT_COOKIE = 'participant_id'
export const PARTICIPANT_COOKIE_MAX_AGE = 90 * 24 * 3600

export const ADMIN_HOME = '/admin/events'
export const DEFAULT_ADMIN_PASSWORD = 'gour'

const TOKEN_SUBJECT = 'admin_access'
const encoder = new TextEncoder()

/** Blank or missing passwords fall back to the default. */
export function resolveAdminPassword(value: string | undefined): string {
  return value && value.trim() ? value.trim() : DEFAULT_ADMIN_PASSWORD
}

/**
 * Cookie value granted on login: hex HMAC-SHA-256 keyed by the admin password.
 * Uses Web Crypto so the middleware can compute it too.
 */
export async function adminToken(password: string): Promise<string> {
  const key = await crypto.subtle.importKey(
    'raw',
    encoder.encode(password),
    { name: 'HMAC', hash: 'SHA-256' },
    false,
    ['sign']
  )
  const signature = await crypto.subtle.sign('HMAC', key, encoder.encode(TOKEN_SUBJECT))
  return Array.from(new Uint8Array(signature), byte => byte.toString(16).padStart(2, '0')).join('')
}

export async function isAdminCookie(value: string | undefined, password: string): Promise<boolean> {
  if (!value) return false
  return value === (await adminToken(password))
}

export function checkAdminPassword(submitted: string, expected: string): boolean {
  return submitted.trim() === expected
}

const SITE = 'http://site.invalid'

/** Only same-origin paths are followed after login. */
export function safeNext(next: string | null | undefined): string {
  if (!next || !next.startsWith('/')) {
    return ADMIN_HOME
  }
  let url: URL
  try {
    url = new URL(next, SITE)
  } catch {
    return ADMIN_HOME
  }
  if (url.origin !== SITE) {
    return ADMIN_HOME
  }
  return `${url.pathname}${url.search}${url.hash}`
}
