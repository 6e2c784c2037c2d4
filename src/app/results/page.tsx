import { cookies } from 'next/headers'
import AiOverview from '@/components/AiOverview'
import ConclusionForm from '@/components/ConclusionForm'
import SearchBar from '@/components/SearchBar'
import SourceList from '@/components/SourceList'
import { PARTICIPANT_COOKIE } from '@/lib/admin'
import { parseAiFlag } from '@/lib/search'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

interface ResultsPageProps {
  searchParams: { q?: string | string[]; ai?: string | string[] }
}

function first(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

export default async function ResultsPage({ searchParams }: ResultsPageProps) {
  const query = first(searchParams.q)?.trim() ?? ''
  const aiEnabled = parseAiFlag(first(searchParams.ai))
  const participantId = cookies().get(PARTICIPANT_COOKIE)?.value.trim() ?? ''

  const result = query
    ? await getServices().search.search({ query, participantId, aiEnabled })
    : null

  return (
    <main className="min-h-screen bg-black">
      <header className="h-16 border-b border-white/10 flex items-center px-6">
        <div className="w-full max-w-3xl mx-auto">
          <SearchBar initialQuery={query} aiEnabled={aiEnabled} />
        </div>
      </header>

      <div className="max-w-3xl mx-auto p-6 space-y-8">
        {participantId && (
          <div className="text-xs text-zinc-500">Participant: {participantId}</div>
        )}

        {result?.overview && (
          <>
            <AiOverview overview={result.overview} citations={result.citations} />
            <section className="space-y-3">
              <h2 className="text-sm font-medium text-zinc-400">Sources</h2>
              <SourceList citations={result.citations} />
            </section>
            <section className="rounded-2xl border border-white/10 bg-zinc-900 p-5">
              <ConclusionForm query={result.query} />
            </section>
          </>
        )}

        {!query && (
          <p className="text-sm text-zinc-400 text-center">Type a query to see results.</p>
        )}
      </div>
    </main>
  )
}
