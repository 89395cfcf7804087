import { parseClockTime } from "@/lib/scheduler/clock-time"
import { NotFoundError, WorkflowError } from "@/lib/scheduler/errors"
import { buildNoShowSuggestion } from "@/lib/scheduler/gap-analyzer"
import {
  dampingFromBlock,
  generateInitialSchedule,
  generateNoShowSchedule,
  markCheckedOff,
  markNoShow,
} from "@/lib/scheduler/operations"
import type { RandomSource, ScheduleVersion, Slot } from "@/lib/scheduler/types"
import {
  NO_SHOW_TYPES,
  activeSchedule,
  activeSlots,
  emptyState,
  findSchedule,
  scheduleId,
  type JudgingState,
} from "./state"

export interface WorkflowContext {
  now: Date
  random?: RandomSource
}

export interface GenerateRequest {
  judgePairs: number
  slotMinutes: number
  blockMinutes: number
  /** Operator-entered times of day, e.g. "9:00 AM" */
  startTime: string
  endTime: string
  matchSchedule: string
}

function replaceActiveSlots(state: JudgingState, slots: Slot[]): ScheduleVersion[] {
  return state.schedules.map((s) => (s.id === state.activeScheduleId ? { ...s, slots } : s))
}

export function applyGenerate(
  state: JudgingState,
  request: GenerateRequest,
  ctx: WorkflowContext
): JudgingState {
  if (state.locked) {
    throw new WorkflowError("Schedule is locked after printing.")
  }

  const start = parseClockTime(request.startTime, "judging start time", ctx.now)
  const end = parseClockTime(request.endTime, "judging end time", ctx.now)

  const result = generateInitialSchedule(
    {
      judgeCount: request.judgePairs,
      slotMinutes: request.slotMinutes,
      windowStart: start.toISOString(),
      windowEnd: end.toISOString(),
      rawMatchFeed: request.matchSchedule,
    },
    ctx.random
  )

  const id = scheduleId("schedule", ctx.now)
  const initial: ScheduleVersion = {
    id,
    label: "Initial schedule",
    type: "initial",
    createdAt: ctx.now.toISOString(),
    slots: result.slots,
  }

  // Teams that did not fit are treated as no-shows from the start
  const noShowSuggestions = result.unassigned
    .filter((team) => (result.teamMatches[team] ?? []).length > 0)
    .map((team) => buildNoShowSuggestion(team, result.teamMatches[team]))

  return {
    ...emptyState(),
    config: {
      judgePairs: request.judgePairs,
      slotMinutes: request.slotMinutes,
      blockMinutes: request.blockMinutes,
      durationMinutes: result.durationMinutes,
      startTime: start.toISOString(),
      endTime: end.toISOString(),
    },
    teamCount: Object.keys(result.teamMatches).length,
    activeScheduleId: id,
    schedules: [initial],
    unassigned: result.unassigned,
    teamMatches: result.teamMatches,
    noShows: [...result.unassigned],
    noShowSuggestions,
  }
}

export function applyCheckoff(state: JudgingState, team: string): JudgingState {
  const slots = markCheckedOff(activeSlots(state), team)
  return {
    ...state,
    schedules: replaceActiveSlots(state, slots),
    noShows: state.noShows.filter((t) => t !== team),
    noShowSuggestions: state.noShowSuggestions.filter((s) => s.team !== team),
    lastSuggestion: state.lastSuggestion?.team === team ? null : state.lastSuggestion,
  }
}

export function applyNoShow(state: JudgingState, team: string): JudgingState {
  const { slots, suggestion } = markNoShow(activeSlots(state), state.teamMatches, team)
  return {
    ...state,
    schedules: replaceActiveSlots(state, slots),
    noShows: state.noShows.includes(team) ? state.noShows : [...state.noShows, team],
    noShowSuggestions: [...state.noShowSuggestions.filter((s) => s.team !== team), suggestion],
    lastSuggestion: suggestion,
  }
}

export function applySetActiveSchedule(state: JudgingState, scheduleIdToActivate: string): JudgingState {
  if (!findSchedule(state, scheduleIdToActivate)) {
    throw new NotFoundError("Schedule not found.")
  }
  return { ...state, activeScheduleId: scheduleIdToActivate }
}

/**
 * Freezes the active slots into a printed version and locks the matching
 * stage. Printing an already-locked stage again changes nothing.
 */
export function applySnapshotPrint(
  state: JudgingState,
  label: string | undefined,
  ctx: WorkflowContext
): JudgingState {
  const slots = activeSlots(state)
  if (slots.length === 0) {
    throw new WorkflowError("No schedule to snapshot.")
  }

  const recovering = NO_SHOW_TYPES.includes(activeSchedule(state)?.type ?? "initial")
  if (recovering ? state.noShowLocked : state.locked) {
    return state
  }

  const printed: ScheduleVersion = recovering
    ? {
        id: scheduleId("printed-noshow", ctx.now),
        label: "Printed no-show recovery",
        type: "printed-noshow",
        createdAt: ctx.now.toISOString(),
        slots: slots.map((s) => ({ ...s })),
      }
    : {
        id: scheduleId("printed", ctx.now),
        label: label?.trim() || "Printed schedule",
        type: "printed",
        createdAt: ctx.now.toISOString(),
        slots: slots.map((s) => ({ ...s })),
      }

  return {
    ...state,
    schedules: [...state.schedules, printed],
    activeScheduleId: printed.id,
    locked: recovering ? state.locked : true,
    noShowLocked: recovering ? true : state.noShowLocked,
  }
}

/**
 * Judge time already committed when recovery runs: the active version, and
 * when that is itself a recovery version, the latest main schedule as well.
 * Earlier placements of the teams being placed again are left out.
 */
export function committedSlots(state: JudgingState, teams: ReadonlySet<string>): Slot[] {
  const active = activeSchedule(state)
  if (!active) return []

  const versions = [active]
  if (NO_SHOW_TYPES.includes(active.type)) {
    const main = [...state.schedules].reverse().find((s) => !NO_SHOW_TYPES.includes(s.type))
    if (main) versions.push(main)
  }

  return versions
    .flatMap((v) => v.slots)
    .filter((s) => !(s.status === "rescheduled" && s.team != null && teams.has(s.team)))
}

export function applyGenerateNoShow(state: JudgingState, ctx: WorkflowContext): JudgingState {
  if (state.noShowLocked) {
    throw new WorkflowError("No-show schedule is locked after printing.")
  }
  if (!state.config) {
    throw new WorkflowError("Generate a schedule first.")
  }
  const suggestions = state.noShowSuggestions
  if (suggestions.length === 0) {
    throw new WorkflowError("No no-show teams to schedule.")
  }

  const { slots, unscheduled } = generateNoShowSchedule(
    {
      activeSlots: committedSlots(state, new Set(suggestions.map((s) => s.team))),
      suggestions,
      slotMinutes: state.config.slotMinutes,
      judgeCount: state.config.judgePairs,
      dampingMinutes: dampingFromBlock(state.config.blockMinutes),
    },
    ctx.random
  )

  // A single recovery version is kept and overwritten on every run
  const existing = state.schedules.find((s) => s.type === "noshow")
  const recovery: ScheduleVersion = {
    id: existing?.id ?? scheduleId("noshow-schedule", ctx.now),
    label: "No-show recovery",
    type: "noshow",
    createdAt: ctx.now.toISOString(),
    slots,
  }

  return {
    ...state,
    schedules: existing
      ? state.schedules.map((s) => (s.id === existing.id ? recovery : s))
      : [...state.schedules, recovery],
    activeScheduleId: recovery.id,
    unscheduled,
  }
}

export function applyReset(): JudgingState {
  return emptyState()
}
