import type { CsvRow } from '@/lib/csv'

export default function LogTable({ rows }: { rows: CsvRow[] }) {
  const [header = [], ...body] = rows

  if (body.length === 0) {
    return <p className="text-sm text-zinc-400">No entries yet.</p>
  }

  return (
    <div className="overflow-x-auto rounded-lg border border-white/10">
      <table className="min-w-full text-xs">
        <thead className="bg-zinc-900 text-zinc-400">
          <tr>
            {header.map(column => (
              <th key={column} className="px-3 py-2 text-left font-medium">{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {body.map((row, i) => (
            <tr key={i} className="border-t border-white/5 align-top">
              {row.map((cell, j) => (
                <td key={j} className="px-3 py-2 text-zinc-200 max-w-md break-words">{cell}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
