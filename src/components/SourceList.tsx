import { ExternalLink } from 'lucide-react'
import type { Citation } from '@/types'

export default function SourceList({ citations }: { citations: Citation[] }) {
  if (citations.length === 0) {
    return <p className="text-sm text-zinc-400">No saved pages matched this search.</p>
  }

  return (
    <ol className="space-y-3">
      {citations.map(citation => (
        <li key={citation.index} className="p-3 rounded-lg bg-zinc-800/50 border border-zinc-700/50">
          <a href={citation.href} className="flex items-center space-x-3 text-sm text-white hover:text-blue-300">
            <span className="px-2 py-0.5 rounded-md bg-zinc-900 text-xs text-zinc-400">{citation.index}</span>
            <span className="flex-1 min-w-0 truncate">{citation.title}</span>
            <ExternalLink className="w-4 h-4 flex-shrink-0 text-zinc-500" />
          </a>
        </li>
      ))}
    </ol>
  )
}
