export const dynamic = "force-dynamic"

import { db } from "@/lib/db/connection"
import { readState } from "@/lib/db/state-store"
import { toSlotViews } from "@/lib/export/export"
import { activeSchedule } from "@/lib/judging/state"

export default function BoardPage() {
  const state = readState(db)
  const schedule = activeSchedule(state)

  if (!schedule) {
    return <p>No schedule yet. POST a match schedule to /api/generate to get started.</p>
  }

  const rows = toSlotViews(schedule)
  const judges = [...new Set(rows.map((r) => r.judge))]

  return (
    <div>
      <h1>{schedule.label}</h1>
      <p>
        {state.teamCount} teams · {state.config?.judgePairs ?? 0} judge pairs
        {state.locked && " · printed"}
        {state.noShowLocked && " · recovery printed"}
      </p>

      {judges.map((judge) => (
        <section key={judge}>
          <h2>Judge {judge}</h2>
          <table>
            <thead>
              <tr>
                <th>Time</th>
                <th>Team</th>
                <th>Status</th>
              </tr>
            </thead>
            <tbody>
              {rows
                .filter((r) => r.judge === judge && r.team)
                .map((r) => (
                  <tr key={`${r.start}-${r.team}`}>
                    <td>
                      {r.start}–{r.end}
                    </td>
                    <td>{r.team}</td>
                    <td>{r.between ? `${r.status} (${r.between})` : r.status}</td>
                  </tr>
                ))}
            </tbody>
          </table>
        </section>
      ))}

      {state.noShowSuggestions.length > 0 && (
        <section>
          <h2>No-shows</h2>
          <ul>
            {state.noShowSuggestions.map((s) => (
              <li key={s.team}>
                {s.team}:{" "}
                {s.gaps.length > 0
                  ? s.gaps.map((g) => `${g.minutes} min between ${g.between}`).join(", ")
                  : "no gaps between matches"}
              </li>
            ))}
          </ul>
        </section>
      )}

      {state.unscheduled.length > 0 && <p>Could not reschedule: {state.unscheduled.join(", ")}</p>}
    </div>
  )
}
