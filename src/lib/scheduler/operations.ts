import { assignBalanced } from "./balanced-assigner"
import { MINUTE_MS, toMillis } from "./clock-time"
import { ConfigError, NotFoundError } from "./errors"
import { buildNoShowSuggestion } from "./gap-analyzer"
import { IntervalIndex } from "./interval-index"
import { extractTeamMatches, listTeams } from "./match-extractor"
import { parseMatchFeed } from "./match-feed"
import { rescheduleNoShows, type RescheduleResult } from "./no-show-rescheduler"
import { defaultRandom } from "./random"
import { buildSlotGrid, validateJudgeCount } from "./slot-grid"
import {
  OPEN_STATUSES,
  type NoShowSuggestion,
  type RandomSource,
  type Slot,
  type SlotStatus,
  type TeamMatches,
} from "./types"

export interface InitialScheduleInput {
  judgeCount: number
  slotMinutes: number
  /** ISO-8601 */
  windowStart: string
  windowEnd: string
  rawMatchFeed: string
}

export interface InitialSchedule {
  slots: Slot[]
  unassigned: string[]
  teamMatches: TeamMatches
  durationMinutes: number
}

export function generateInitialSchedule(
  input: InitialScheduleInput,
  random: RandomSource = defaultRandom
): InitialSchedule {
  const { judgeCount, slotMinutes, windowStart, windowEnd, rawMatchFeed } = input

  const startMs = toMillis(windowStart)
  const endMs = toMillis(windowEnd)
  if (Number.isNaN(startMs) || Number.isNaN(endMs)) {
    throw new ConfigError("Judging start and end times must be valid timestamps.")
  }
  const durationMinutes = Math.floor((endMs - startMs) / MINUTE_MS)

  // Grid first so configuration problems surface before the feed is read
  const grid = buildSlotGrid({ judgeCount, windowStart, durationMinutes, slotMinutes })
  const teamMatches = extractTeamMatches(parseMatchFeed(rawMatchFeed))
  const { slots, unassigned } = assignBalanced(grid, listTeams(teamMatches), judgeCount, random)

  return { slots, unassigned, teamMatches, durationMinutes }
}

/** The team's open slot if it has one, otherwise its first slot of any status. */
function findTeamSlotIndex(slots: readonly Slot[], team: string): number {
  const open = slots.findIndex((s) => s.team === team && OPEN_STATUSES.includes(s.status))
  if (open !== -1) return open
  return slots.findIndex((s) => s.team === team)
}

function withTeamStatus(slots: readonly Slot[], team: string, status: SlotStatus): Slot[] {
  const index = findTeamSlotIndex(slots, team)
  if (index === -1) {
    throw new NotFoundError(`Team ${team} not found in slots.`)
  }
  return slots.map((s, i) => (i === index ? { ...s, status } : s))
}

export function markCheckedOff(activeSlots: readonly Slot[], team: string): Slot[] {
  return withTeamStatus(activeSlots, team, "checked")
}

export function markNoShow(
  activeSlots: readonly Slot[],
  teamMatches: TeamMatches,
  team: string
): { slots: Slot[]; suggestion: NoShowSuggestion } {
  const slots = withTeamStatus(activeSlots, team, "no-show")
  return { slots, suggestion: buildNoShowSuggestion(team, teamMatches[team] ?? []) }
}

/** Half the configured block length, or zero when blocks are disabled. */
export function dampingFromBlock(blockMinutes: number): number {
  return blockMinutes > 0 ? blockMinutes / 2 : 0
}

export interface NoShowScheduleInput {
  activeSlots: readonly Slot[]
  suggestions: NoShowSuggestion[]
  slotMinutes: number
  judgeCount: number
  dampingMinutes: number
}

export function generateNoShowSchedule(
  input: NoShowScheduleInput,
  random: RandomSource = defaultRandom
): RescheduleResult {
  const { activeSlots, suggestions, slotMinutes, judgeCount, dampingMinutes } = input
  validateJudgeCount(judgeCount)
  if (!(slotMinutes > 0)) {
    throw new ConfigError(`Slot length must be greater than zero, got ${slotMinutes}`)
  }

  return rescheduleNoShows({
    suggestions,
    slotMinutes,
    judgeCount,
    dampingMinutes,
    index: IntervalIndex.fromSlots(activeSlots),
    random,
  })
}
