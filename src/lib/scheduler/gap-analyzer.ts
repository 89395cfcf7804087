import { MINUTE_MS, toMillis } from "./clock-time"
import { sortEntries } from "./match-extractor"
import type { Gap, NoShowSuggestion, TeamMatchEntry } from "./types"

/**
 * Free time between each pair of consecutive matches, largest first.
 * Zero or negative gaps (duplicate timestamps) are dropped; equal gaps keep
 * chronological order.
 */
export function computeGaps(entries: readonly TeamMatchEntry[]): Gap[] {
  const gaps: Gap[] = []
  for (let i = 0; i < entries.length - 1; i++) {
    const current = entries[i]
    const next = entries[i + 1]
    const minutes = Math.floor((toMillis(next.time) - toMillis(current.time)) / MINUTE_MS)
    if (minutes <= 0) continue
    gaps.push({
      start: current.time,
      end: next.time,
      minutes,
      between: `${current.label} and ${next.label}`,
    })
  }
  return gaps.sort((a, b) => b.minutes - a.minutes)
}

export function buildNoShowSuggestion(
  team: string,
  entries: readonly TeamMatchEntry[]
): NoShowSuggestion {
  return { team, gaps: computeGaps(sortEntries(entries)) }
}
