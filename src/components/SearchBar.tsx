'use client'

import { useState } from 'react'
import { ArrowRight } from 'lucide-react'

interface SearchBarProps {
  initialQuery: string;
  aiEnabled: boolean;
}

export default function SearchBar({ initialQuery, aiEnabled }: SearchBarProps) {
  const [query, setQuery] = useState(initialQuery)

  return (
    <form action="/results" method="get" className="relative group">
      <input
        type="text"
        name="q"
        value={query}
        onChange={(e) => setQuery(e.target.value)}
        placeholder="Search…"
        className="w-full px-5 py-3 pr-14 bg-zinc-900 border border-white/10 rounded-full focus:outline-none focus:ring-2 focus:ring-blue-500 text-white placeholder:text-zinc-500"
      />
      {!aiEnabled && <input type="hidden" name="ai" value="0" />}
      <button
        type="submit"
        disabled={!query.trim()}
        className="absolute right-2 top-1/2 -translate-y-1/2 p-2 bg-zinc-800 text-white rounded-full hover:bg-zinc-700 disabled:opacity-50 disabled:cursor-not-allowed transition-all duration-300"
      >
        <ArrowRight className="w-5 h-5" />
      </button>
    </form>
  )
}
