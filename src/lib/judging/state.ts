import type {
  NoShowSuggestion,
  ScheduleType,
  ScheduleVersion,
  Slot,
  TeamMatches,
} from "@/lib/scheduler/types"

export type EventConfig = {
  judgePairs: number
  slotMinutes: number
  /** Match block length; half of it is kept clear around matches when rescheduling */
  blockMinutes: number
  durationMinutes: number
  startTime: string
  endTime: string
}

/** Everything the judging desk persists, as one snapshot. */
export type JudgingState = {
  config: EventConfig | null
  /** Set once the initial schedule has been printed */
  locked: boolean
  /** Set once a no-show recovery schedule has been printed */
  noShowLocked: boolean
  teamCount: number
  activeScheduleId: string | null
  schedules: ScheduleVersion[]
  /** Teams the initial pass could not fit into the grid */
  unassigned: string[]
  teamMatches: TeamMatches
  noShows: string[]
  noShowSuggestions: NoShowSuggestion[]
  lastSuggestion: NoShowSuggestion | null
  /** No-show teams the latest recovery run could not place */
  unscheduled: string[]
}

export function emptyState(): JudgingState {
  return {
    config: null,
    locked: false,
    noShowLocked: false,
    teamCount: 0,
    activeScheduleId: null,
    schedules: [],
    unassigned: [],
    teamMatches: {},
    noShows: [],
    noShowSuggestions: [],
    lastSuggestion: null,
    unscheduled: [],
  }
}

export function findSchedule(state: JudgingState, scheduleId: string | null): ScheduleVersion | undefined {
  if (!scheduleId) return undefined
  return state.schedules.find((s) => s.id === scheduleId)
}

export function activeSchedule(state: JudgingState): ScheduleVersion | undefined {
  return findSchedule(state, state.activeScheduleId)
}

export function activeSlots(state: JudgingState): Slot[] {
  return activeSchedule(state)?.slots ?? []
}

export const NO_SHOW_TYPES: readonly ScheduleType[] = ["noshow", "printed-noshow"]

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

/** "<prefix>-YYYYMMDD-HHMMSS" in local time */
export function scheduleId(prefix: string, now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${prefix}-${date}-${time}`
}
