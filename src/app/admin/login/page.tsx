import AdminLoginForm from '@/components/AdminLoginForm'
import { safeNext } from '@/lib/admin'

interface AdminLoginPageProps {
  searchParams: { next?: string; error?: string }
}

export default function AdminLoginPage({ searchParams }: AdminLoginPageProps) {
  return (
    <main className="min-h-screen flex flex-col items-center justify-center px-4 bg-black">
      <AdminLoginForm next={safeNext(searchParams.next)} failed={searchParams.error === '1'} />
    </main>
  )
}
