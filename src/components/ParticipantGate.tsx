'use client'

import { useState } from 'react'
import { motion } from 'framer-motion'

export default function ParticipantGate() {
  const [participantId, setParticipantId] = useState('')

  return (
    <motion.div
      initial={{ opacity: 0, y: 20 }}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: 0.6 }}
      className="w-full max-w-md bg-zinc-900 rounded-2xl p-6 border border-white/10"
    >
      <div className="text-center mb-6">
        <h1 className="text-2xl font-medium text-white mb-2">Welcome</h1>
        <p className="text-zinc-400 text-sm">Enter your participant ID to start searching</p>
      </div>

      <form action="/api/participant" method="post" className="space-y-4">
        <input
          type="text"
          name="participant_id"
          value={participantId}
          onChange={(e) => setParticipantId(e.target.value)}
          className="w-full px-4 py-2.5 bg-zinc-800 border border-white/10 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 text-white placeholder:text-zinc-500"
          placeholder="Participant ID"
          required
        />
        <button
          type="submit"
          disabled={!participantId.trim()}
          className="w-full py-2.5 px-4 bg-blue-600 hover:bg-blue-700 text-white rounded-lg font-medium transition-colors duration-200 disabled:opacity-50 disabled:cursor-not-allowed"
        >
          Continue
        </button>
      </form>
    </motion.div>
  )
}
