import type { NextRequest } from 'next/server'
import { NextResponse } from 'next/server'
import fs from 'fs-extra'
import { resolveSavedPath } from '@/lib/pages'
import { getServices } from '@/lib/services'
import { isCorpusName } from '@/types'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

function notFound() {
  return new NextResponse('Not Found', { status: 404 })
}

export async function GET(request: NextRequest) {
  const corpus = request.nextUrl.searchParams.get('corpus')
  const name = request.nextUrl.searchParams.get('name') ?? ''
  if (!isCorpusName(corpus)) {
    return notFound()
  }

  try {
    const { config } = getServices()
    const file = resolveSavedPath(config.pagesDir, corpus, name)
    if (!file || !(await fs.pathExists(file)) || !(await fs.stat(file)).isFile()) {
      return notFound()
    }

    const html = await fs.readFile(file, 'utf8')
    return new NextResponse(html, {
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
    })
  } catch (error) {
    console.error('Saved page error:', error)
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'An unexpected error occurred' },
      { status: 500 }
    )
  }
}
