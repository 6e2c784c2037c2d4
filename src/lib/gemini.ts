import { GoogleGenerativeAI } from '@google/generative-ai'
import type { AppConfig } from '@/lib/config'
import { buildOverviewPrompt } from '@/lib/prompt'
import type { SavedPage } from '@/types'

export type AiFailureReason = 'missing-key' | 'timeout' | 'http' | 'empty' | 'malformed' | 'network'

export type AiOverviewResult =
  | { ok: true; text: string }
  | { ok: false; reason: AiFailureReason; message: string }

/** The slice of the SDK's `GenerativeModel` the client relies on. */
export interface OverviewModel {
  generateContent(
    prompt: string,
    options?: { signal?: AbortSignal }
  ): Promise<{ response: { text(): string } }>
}

type GeminiSettings = Pick<AppConfig, 'geminiApiKey' | 'geminiModel' | 'geminiTimeoutMs'>

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class GeminiOverviewClient {
  private model: OverviewModel | null
  private timeoutMs: number

  /** An injected model is only used when a key is configured as well. */
  constructor(settings: GeminiSettings, model?: OverviewModel) {
    this.timeoutMs = settings.geminiTimeoutMs
    if (!settings.geminiApiKey) {
      this.model = null
    } else if (model) {
      this.model = model
    } else {
      const googleAI = new GoogleGenerativeAI(settings.geminiApiKey)
      this.model = googleAI.getGenerativeModel({ model: settings.geminiModel })
    }
  }

  get configured(): boolean {
    return this.model !== null
  }

  async generate(query: string, ranked: SavedPage[]): Promise<AiOverviewResult> {
    if (!this.model) {
      return { ok: false, reason: 'missing-key', message: 'No Gemini API key configured' }
    }

    const prompt = buildOverviewPrompt(query, ranked)
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    let response: { text(): string }
    try {
      const result = await this.model.generateContent(prompt, { signal: controller.signal })
      response = result.response
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, reason: 'timeout', message: `Gemini request timed out after ${this.timeoutMs}ms` }
      }
      const status = httpStatusOf(error)
      if (status !== undefined) {
        return { ok: false, reason: 'http', message: `Gemini API error (${status}): ${messageOf(error)}` }
      }
      return { ok: false, reason: 'network', message: messageOf(error) }
    } finally {
      clearTimeout(timeoutId)
    }

    let text: string
    try {
      text = response.text()
    } catch (error) {
      // text() throws when the candidate was blocked or carries no parts
      return { ok: false, reason: 'malformed', message: messageOf(error) }
    }

    const paragraph = (text || '').replace(/\s+/g, ' ').trim()
    if (!paragraph) {
      return { ok: false, reason: 'empty', message: 'Empty response from Gemini' }
    }
    return { ok: true, text: paragraph }
  }
}
