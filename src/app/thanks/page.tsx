import { Check } from 'lucide-react'

export default function ThanksPage() {
  return (
    <main className="min-h-screen flex flex-col items-center justify-center px-4 bg-black">
      <div className="w-full max-w-md bg-zinc-900 rounded-2xl p-6 border border-white/10 text-center space-y-3">
        <Check className="w-8 h-8 mx-auto text-green-500" />
        <h1 className="text-2xl font-medium text-white">Thank you</h1>
        <p className="text-zinc-400 text-sm">Your conclusion has been recorded.</p>
        <a href="/results" className="inline-block text-sm text-blue-400 hover:text-blue-300">
          Back to search
        </a>
      </div>
    </main>
  )
}
