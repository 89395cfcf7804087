import { asc, eq } from "drizzle-orm"
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core"
import type { RunResult } from "better-sqlite3"
import { emptyState, type JudgingState } from "@/lib/judging/state"
import type { ScheduleVersion, Slot, TeamMatches } from "@/lib/scheduler/types"
import type { JudgingDatabase } from "./open"
import {
  judgingEvents,
  noShowSuggestions,
  scheduleVersions,
  slots,
  teamLists,
  teamMatches,
} from "./schema"

/** A database handle or an open transaction on one. */
type Executor = BaseSQLiteDatabase<"sync", RunResult>

const EVENT_ROW_ID = 1

export function readState(db: Executor): JudgingState {
  const event = db.select().from(judgingEvents).where(eq(judgingEvents.id, EVENT_ROW_ID)).get()
  if (!event) return emptyState()

  const slotRows = db
    .select()
    .from(slots)
    .orderBy(asc(slots.scheduleId), asc(slots.position))
    .all()
  const slotsBySchedule = new Map<string, Slot[]>()
  for (const row of slotRows) {
    const slot: Slot = {
      judgeId: row.judgeId,
      start: row.start,
      end: row.end,
      team: row.team,
      status: row.status,
      ...(row.between != null && { between: row.between }),
    }
    const list = slotsBySchedule.get(row.scheduleId) ?? []
    list.push(slot)
    slotsBySchedule.set(row.scheduleId, list)
  }

  const schedules: ScheduleVersion[] = db
    .select()
    .from(scheduleVersions)
    .orderBy(asc(scheduleVersions.position))
    .all()
    .map((v) => ({
      id: v.id,
      label: v.label,
      type: v.type,
      createdAt: v.createdAt,
      slots: slotsBySchedule.get(v.id) ?? [],
    }))

  const matches: TeamMatches = {}
  const matchRows = db
    .select()
    .from(teamMatches)
    .orderBy(asc(teamMatches.team), asc(teamMatches.position))
    .all()
  for (const row of matchRows) {
    if (!matches[row.team]) matches[row.team] = []
    matches[row.team].push({ time: row.time, label: row.label })
  }

  const listRows = db.select().from(teamLists).orderBy(asc(teamLists.id)).all()
  const teamsIn = (list: (typeof listRows)[number]["list"]) =>
    listRows.filter((r) => r.list === list).map((r) => r.team)

  const suggestions = db
    .select()
    .from(noShowSuggestions)
    .orderBy(asc(noShowSuggestions.id))
    .all()
    .map((row) => ({ team: row.team, gaps: row.gaps }))

  return {
    config: {
      judgePairs: event.judgePairs,
      slotMinutes: event.slotMinutes,
      blockMinutes: event.blockMinutes,
      durationMinutes: event.durationMinutes,
      startTime: event.startTime,
      endTime: event.endTime,
    },
    locked: event.locked,
    noShowLocked: event.noShowLocked,
    teamCount: event.teamCount,
    activeScheduleId: event.activeScheduleId,
    schedules,
    unassigned: teamsIn("unassigned"),
    teamMatches: matches,
    noShows: teamsIn("no_show"),
    noShowSuggestions: suggestions,
    lastSuggestion: suggestions.find((s) => s.team === event.lastSuggestionTeam) ?? null,
    unscheduled: teamsIn("unscheduled"),
  }
}

/** Replaces everything stored with `state`. */
export function writeState(db: Executor, state: JudgingState): void {
  db.delete(slots).run()
  db.delete(scheduleVersions).run()
  db.delete(teamMatches).run()
  db.delete(teamLists).run()
  db.delete(noShowSuggestions).run()
  db.delete(judgingEvents).run()

  if (!state.config) return

  db.insert(judgingEvents)
    .values({
      id: EVENT_ROW_ID,
      ...state.config,
      locked: state.locked,
      noShowLocked: state.noShowLocked,
      teamCount: state.teamCount,
      activeScheduleId: state.activeScheduleId,
      lastSuggestionTeam: state.lastSuggestion?.team ?? null,
    })
    .run()

  if (state.schedules.length > 0) {
    db.insert(scheduleVersions)
      .values(
        state.schedules.map((v, position) => ({
          id: v.id,
          position,
          label: v.label,
          type: v.type,
          createdAt: v.createdAt,
        }))
      )
      .run()
  }

  const slotRows = state.schedules.flatMap((v) =>
    v.slots.map((s, position) => ({
      scheduleId: v.id,
      position,
      judgeId: s.judgeId,
      start: s.start,
      end: s.end,
      team: s.team,
      status: s.status,
      between: s.between ?? null,
    }))
  )
  if (slotRows.length > 0) {
    db.insert(slots).values(slotRows).run()
  }

  const matchRows = Object.entries(state.teamMatches).flatMap(([team, entries]) =>
    entries.map((e, position) => ({ team, position, time: e.time, label: e.label }))
  )
  if (matchRows.length > 0) {
    db.insert(teamMatches).values(matchRows).run()
  }

  const listRows = [
    ...state.unassigned.map((team) => ({ list: "unassigned" as const, team })),
    ...state.noShows.map((team) => ({ list: "no_show" as const, team })),
    ...state.unscheduled.map((team) => ({ list: "unscheduled" as const, team })),
  ]
  if (listRows.length > 0) {
    db.insert(teamLists).values(listRows).run()
  }

  if (state.noShowSuggestions.length > 0) {
    db.insert(noShowSuggestions)
      .values(state.noShowSuggestions.map((s) => ({ team: s.team, gaps: s.gaps })))
      .run()
  }
}

/**
 * Reads the state, applies `update` and stores the result, all inside one
 * IMMEDIATE transaction. If `update` throws, nothing is written.
 */
export function runExclusive(
  db: JudgingDatabase,
  update: (state: JudgingState) => JudgingState
): JudgingState {
  return db.transaction(
    (tx) => {
      const current = readState(tx)
      const next = update(current)
      if (next !== current) {
        writeState(tx, next)
      }
      return next
    },
    { behavior: "immediate" }
  )
}
