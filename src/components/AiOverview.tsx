import { Sparkles, ListTree } from 'lucide-react'
import type { Citation, Overview } from '@/types'

interface AiOverviewProps {
  overview: Overview;
  citations: Citation[];
}

// Turns the "[2]" markers of the overview text into links to the cited source
function withCitationLinks(text: string, citations: Citation[]) {
  return text.split(/(\[\d+\])/g).map((part, i) => {
    const match = part.match(/^\[(\d+)\]$/)
    const citation = match ? citations.find(c => c.index === Number(match[1])) : undefined
    if (!citation) return part
    return (
      <a key={i} href={citation.href} className="citation" title={citation.title}>
        {part}
      </a>
    )
  })
}

export default function AiOverview({ overview, citations }: AiOverviewProps) {
  const isAi = overview.source === 'ai'

  return (
    <section id="overview" className="rounded-2xl border border-white/10 bg-zinc-900 p-5 space-y-3">
      <div className="flex items-center space-x-2 text-xs font-semibold uppercase tracking-wide text-green-400">
        {isAi ? <Sparkles className="w-4 h-4" /> : <ListTree className="w-4 h-4" />}
        <span>{isAi ? 'AI Overview' : 'Overview'}</span>
      </div>
      <p className="text-[17px] leading-[1.65] text-zinc-100" data-source={overview.source}>
        {withCitationLinks(overview.text, citations)}
      </p>
    </section>
  )
}
