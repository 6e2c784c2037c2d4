import { cookies } from 'next/headers'
import { redirect } from 'next/navigation'
import ParticipantGate from '@/components/ParticipantGate'
import { PARTICIPANT_COOKIE } from '@/lib/admin'

export default function Home() {
  const participantId = cookies().get(PARTICIPANT_COOKIE)?.value.trim()
  if (participantId) {
    redirect('/results')
  }

  return (
    <main className="min-h-screen flex flex-col items-center justify-center px-4 bg-black relative overflow-hidden">
      <div className="absolute inset-0 bg-[radial-gradient(circle_at_center,rgba(255,255,255,0.02)_0%,transparent_100%)] pointer-events-none" />
      <ParticipantGate />
    </main>
  )
}
