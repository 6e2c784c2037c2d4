import { describe, expect, it } from 'vitest'
import { buildOverviewPrompt, OVERVIEW_INSTRUCTIONS, snippetOf } from '@/lib/prompt'
import type { SavedPage } from '@/types'

describe('snippetOf', () => {
  it('collapses whitespace', () => {
    expect(snippetOf('  a\n\n b\tc  ')).toBe('a b c')
  })

  it('cuts long text at 3000 characters', () => {
    const snippet = snippetOf('x'.repeat(3500))
    expect(snippet).toBe(`${'x'.repeat(3000)}…`)
  })
})

describe('buildOverviewPrompt', () => {
  it('numbers the sources and appends the instructions', () => {
    const ranked: SavedPage[] = [
      { title: 'First', text: 'alpha  beta', name: 'a.html', corpus: 'webpages' },
      { title: '', text: 'gamma', name: 'b.html', corpus: 'webpages' },
    ]

    expect(buildOverviewPrompt('what is alpha', ranked)).toBe(
      `QUERY:\nwhat is alpha\n\nSOURCES:\n[1] First\nalpha beta\n\n[2] b.html\ngamma\n\n${OVERVIEW_INSTRUCTIONS}`
    )
  })
})
