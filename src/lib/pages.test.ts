import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { chooseCorpus, extractPage, loadPages, rankPages, resolveSavedPath, scoreQuery } from '@/lib/pages'
import type { SavedPage } from '@/types'

describe('chooseCorpus', () => {
  it('sends odd last digits to webpages', () => {
    expect(chooseCorpus('P-1027')).toEqual({ group: 1, corpus: 'webpages' })
  })

  it('sends even last digits to webpages2', () => {
    expect(chooseCorpus('5f3a8x')).toEqual({ group: 2, corpus: 'webpages2' })
    expect(chooseCorpus('10')).toEqual({ group: 2, corpus: 'webpages2' })
  })

  it('defaults ids without digits to webpages', () => {
    expect(chooseCorpus('abc')).toEqual({ group: 1, corpus: 'webpages' })
    expect(chooseCorpus('')).toEqual({ group: 1, corpus: 'webpages' })
  })
})

describe('extractPage', () => {
  it('reads the title and the visible text', () => {
    const html = `<html><head><title> Coffee &amp; Sleep | Health </title><style>p{}</style></head>
      <body><h1>Heading</h1><script>var x = 1</script><p>Caffeine&nbsp;lasts <b>hours</b>.</p></body></html>`

    expect(extractPage(html, 'coffee.html', 'webpages')).toEqual({
      title: 'Coffee & Sleep | Health',
      text: 'Heading Caffeine lasts hours .',
      name: 'coffee.html',
      corpus: 'webpages',
    })
  })

  it('falls back to the first h1, then to the file name', () => {
    expect(extractPage('<h1>Only heading</h1>', 'a.html', 'webpages').title).toBe('Only heading')
    expect(extractPage('<p>No title</p>', 'b.html', 'webpages2').title).toBe('b.html')
  })
})

describe('scoreQuery', () => {
  it('counts query words longer than two characters', () => {
    expect(scoreQuery('Coffee, coffee and more COFFEE. Is it bad?', 'is coffee bad')).toBe(4)
  })

  it('scores zero without usable words', () => {
    expect(scoreQuery('anything', 'a an')).toBe(0)
    expect(scoreQuery('', 'coffee')).toBe(0)
  })
})

describe('rankPages', () => {
  const page = (name: string, text: string): SavedPage => ({ title: name, text, name, corpus: 'webpages' })

  it('orders by score and keeps corpus order for ties', () => {
    const pages = [page('a.html', 'tea'), page('b.html', 'coffee'), page('c.html', 'coffee coffee'), page('d.html', 'coffee')]

    expect(rankPages(pages, 'coffee', 3).map(p => p.name)).toEqual(['c.html', 'b.html', 'd.html'])
  })
})

describe('resolveSavedPath', () => {
  it('only accepts plain .html file names', () => {
    expect(resolveSavedPath('/pages', 'webpages', 'a.html')).toBe(path.join('/pages', 'webpages', 'a.html'))
    expect(resolveSavedPath('/pages', 'webpages', '../secret.html')).toBeNull()
    expect(resolveSavedPath('/pages', 'webpages', 'notes.txt')).toBeNull()
    expect(resolveSavedPath('/pages', 'webpages', '')).toBeNull()
  })
})

describe('loadPages', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pages-'))
    await fs.outputFile(path.join(dir, 'webpages', 'b.html'), '<title>B</title><p>bravo</p>')
    await fs.outputFile(path.join(dir, 'webpages', 'a.html'), '<title>A</title><p>alpha</p>')
    await fs.outputFile(path.join(dir, 'webpages', 'c.html'), '<title>C</title><p>charlie</p>')
    await fs.outputFile(path.join(dir, 'webpages', 'notes.txt'), 'ignored')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.remove(dir)
  })

  it('reads html files in name order up to the limit', async () => {
    const pages = await loadPages(dir, 'webpages', 2)

    expect(pages).toEqual([
      { title: 'A', text: 'alpha', name: 'a.html', corpus: 'webpages' },
      { title: 'B', text: 'bravo', name: 'b.html', corpus: 'webpages' },
    ])
  })

  it('keeps loading when one entry cannot be read', async () => {
    await fs.ensureDir(path.join(dir, 'webpages', 'broken.html'))
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const pages = await loadPages(dir, 'webpages', 10)

    expect(pages.map(page => page.name)).toEqual(['a.html', 'b.html', 'broken.html', 'c.html'])
    expect(pages[2]).toEqual({ title: 'broken.html', text: '', name: 'broken.html', corpus: 'webpages' })
    expect(pages[3].text).toBe('charlie')
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toBe('[Pages] Could not read broken.html:')
  })

  it('returns nothing for a missing corpus', async () => {
    expect(await loadPages(dir, 'webpages2', 10)).toEqual([])
  })
})
