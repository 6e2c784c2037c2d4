'use client'

import { motion, AnimatePresence } from 'framer-motion'
import { Lock } from 'lucide-react'

interface AdminLoginFormProps {
  next: string;
  failed: boolean;
}

export default function AdminLoginForm({ next, failed }: AdminLoginFormProps) {
  return (
    <motion.div
      className="w-full max-w-md bg-zinc-900 rounded-2xl p-6 border border-white/10"
      initial={{ opacity: 0, scale: 0.95 }}
      animate={{ opacity: 1, scale: 1 }}
      transition={{ duration: 0.6, delay: 0.1 }}
    >
      <div className="text-center mb-6">
        <Lock className="w-6 h-6 mx-auto mb-3 text-zinc-400" />
        <h1 className="text-2xl font-medium text-white">Admin Login</h1>
      </div>

      <form action="/api/admin/login" method="post" className="space-y-4">
        <input type="hidden" name="next" value={next} />
        <div>
          <label className="block text-sm font-medium text-zinc-400 mb-1.5">
            Password
          </label>
          <input
            type="password"
            name="password"
            className="w-full px-4 py-2.5 bg-zinc-800 border border-white/10 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 text-white placeholder:text-zinc-500"
            placeholder="••••••••"
            required
          />
        </div>

        <AnimatePresence>
          {failed && (
            <motion.div
              initial={{ opacity: 0, y: -10 }}
              animate={{ opacity: 1, y: 0 }}
              className="p-3 rounded-lg bg-red-500/10 border border-red-500/20"
            >
              <p className="text-sm text-red-400">Wrong password.</p>
            </motion.div>
          )}
        </AnimatePresence>

        <button
          type="submit"
          className="w-full py-2.5 px-4 bg-blue-600 hover:bg-blue-700 text-white rounded-lg font-medium transition-colors duration-200"
        >
          Sign In
        </button>
      </form>
    </motion.div>
  )
}
