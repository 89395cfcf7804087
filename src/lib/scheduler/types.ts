export type SlotStatus = "scheduled" | "checked" | "no-show" | "rescheduled"

/** Statuses that still hold judge time for the team. */
export const OPEN_STATUSES: readonly SlotStatus[] = ["scheduled", "rescheduled"]

export type Slot = {
  judgeId: number
  /** ISO-8601 timestamps */
  start: string
  end: string
  team: string | null
  status: SlotStatus
  /** Gap label a rescheduled slot was placed in, e.g. "Q4 and Q9" */
  between?: string
}

export type TeamMatchEntry = {
  time: string
  label: string
}

/** team number → matches sorted ascending by time */
export type TeamMatches = Record<string, TeamMatchEntry[]>

export type Gap = {
  start: string
  end: string
  minutes: number
  between: string
}

export type NoShowSuggestion = {
  team: string
  gaps: Gap[]
}

export type ScheduleType = "initial" | "noshow" | "printed" | "printed-noshow"

export type ScheduleVersion = {
  id: string
  label: string
  type: ScheduleType
  createdAt: string
  slots: Slot[]
}

/** Half-open [start, end) in epoch milliseconds */
export type Interval = {
  start: number
  end: number
}

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number
