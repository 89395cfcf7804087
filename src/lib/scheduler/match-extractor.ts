import type { MatchRecord } from "./match-feed"
import { toMillis, toTimestamp } from "./clock-time"
import type { TeamMatchEntry, TeamMatches } from "./types"

type MatchInfo = NonNullable<MatchRecord["matchInfo"]>

/**
 * Human label for a match: qualification rounds render as "Q12",
 * other rounds as "<ROUND><number>" (e.g. "SF2"), a bare number as "Match 7".
 */
export function matchLabel(info: MatchInfo): string {
  const round = String(info.matchTuple?.round ?? "").toUpperCase()
  const number = info.matchTuple?.match
  if (round && number != null) {
    if (round === "QUAL") return `Q${number}`
    return `${round}${number}`
  }
  if (number != null) return `Match ${number}`
  return "Match"
}

export function sortEntries(entries: readonly TeamMatchEntry[]): TeamMatchEntry[] {
  // Array.prototype.sort is stable, so same-time matches keep feed order
  return [...entries].sort((a, b) => toMillis(a.time) - toMillis(b.time))
}

/**
 * Collects, per team, every timed match it plays in. Records without a
 * scheduled time are unscheduled placeholders and are skipped.
 */
export function extractTeamMatches(records: readonly MatchRecord[]): TeamMatches {
  const teamMatches: TeamMatches = {}

  for (const record of records) {
    const info = record.matchInfo
    if (!info || info.timeScheduled == null) continue

    const time = toTimestamp(info.timeScheduled * 1000)
    const label = matchLabel(info)

    for (const alliance of info.alliances ?? []) {
      for (const team of alliance.teams ?? []) {
        const teamNumber = String(team.number ?? "").trim()
        if (!teamNumber) continue
        if (!teamMatches[teamNumber]) {
          teamMatches[teamNumber] = []
        }
        teamMatches[teamNumber].push({ time, label })
      }
    }
  }

  for (const [team, entries] of Object.entries(teamMatches)) {
    teamMatches[team] = sortEntries(entries)
  }
  return teamMatches
}

/** Numeric team numbers first, by value, then the rest alphabetically. */
export function compareTeams(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a)
  const bNumeric = /^\d+$/.test(b)
  if (aNumeric && bNumeric) return Number(a) - Number(b)
  if (aNumeric) return -1
  if (bNumeric) return 1
  return a < b ? -1 : a > b ? 1 : 0
}

export function listTeams(teamMatches: TeamMatches): string[] {
  return Object.keys(teamMatches).sort(compareTeams)
}
