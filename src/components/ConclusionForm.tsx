'use client'

import { useState } from 'react'

export default function ConclusionForm({ query }: { query: string }) {
  const [text, setText] = useState('')
  const wordCount = text.split(/\s+/).filter(Boolean).length

  return (
    <form action="/api/submit" method="post" className="space-y-3">
      <input type="hidden" name="q" value={query} />
      <label className="block text-sm font-medium text-zinc-400">
        Write your conclusion about this search
      </label>
      <textarea
        name="conclusion"
        value={text}
        onChange={(e) => setText(e.target.value)}
        rows={6}
        className="w-full px-4 py-2.5 bg-zinc-800 border border-white/10 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 text-white"
      />
      <div className="flex items-center justify-between">
        <span className="text-xs text-zinc-500">{wordCount} words</span>
        <button
          type="submit"
          disabled={wordCount === 0}
          className="py-2 px-4 bg-blue-600 hover:bg-blue-700 text-white rounded-lg font-medium transition-colors duration-200 disabled:opacity-50 disabled:cursor-not-allowed"
        >
          Submit
        </button>
      </div>
    </form>
  )
}
