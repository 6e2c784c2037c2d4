import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { NextRequest } from 'next/server'
import { loadConfig } from '@/lib/config'
import type { OverviewModel } from '@/lib/gemini'
import { createServices, type Services } from '@/lib/services'

export interface TestServices {
  services: Services
  dir: string
  cleanup(): Promise<void>
}

/** Services over a temporary corpus with two saved pages in `webpages`. */
export async function createTestServices(env: Record<string, string> = {}, model?: OverviewModel): Promise<TestServices> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'overview-lab-'))
  await fs.outputFile(path.join(dir, 'webpages', 'coffee.html'), '<title>Coffee | Daily</title><p>coffee coffee</p>')
  await fs.outputFile(path.join(dir, 'webpages', 'tea.html'), '<title>Tea</title><p>tea and coffee</p>')

  const config = loadConfig({
    PAGES_DIR: dir,
    LOGS_DIR: path.join(dir, 'logs'),
    ADMIN_PASSWORD: 'test-secret',
    GEMINI_TIMEOUT_MS: '50',
    ...env,
  })
  return {
    services: createServices(config, model),
    dir,
    cleanup: () => fs.remove(dir),
  }
}

export function jsonRequest(url: string, body: unknown, cookie?: string): NextRequest {
  return new NextRequest(url, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json', ...(cookie ? { cookie } : {}) },
  })
}

export function formRequest(url: string, fields: Record<string, string>, cookie?: string): NextRequest {
  return new NextRequest(url, {
    method: 'POST',
    body: new URLSearchParams(fields),
    headers: cookie ? { cookie } : {},
  })
}

export function textRequest(url: string, body: string): NextRequest {
  return new NextRequest(url, {
    method: 'POST',
    body,
    headers: { 'content-type': 'text/plain' },
  })
}
