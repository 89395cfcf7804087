import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core"
import type { Gap } from "@/lib/scheduler/types"

/** Single row (id = 1) holding the event configuration and workflow flags. */
export const judgingEvents = sqliteTable("judging_events", {
  id: integer("id").primaryKey(),
  judgePairs: integer("judge_pairs").notNull(),
  slotMinutes: integer("slot_minutes").notNull(),
  blockMinutes: integer("block_minutes").notNull(),
  durationMinutes: integer("duration_minutes").notNull(),
  startTime: text("start_time").notNull(),
  endTime: text("end_time").notNull(),
  locked: integer("locked", { mode: "boolean" }).notNull().default(false),
  noShowLocked: integer("no_show_locked", { mode: "boolean" }).notNull().default(false),
  teamCount: integer("team_count").notNull().default(0),
  activeScheduleId: text("active_schedule_id"),
  lastSuggestionTeam: text("last_suggestion_team"),
})

export const scheduleVersions = sqliteTable("schedule_versions", {
  id: text("id").primaryKey(),
  position: integer("position").notNull(),
  label: text("label").notNull(),
  type: text("type", { enum: ["initial", "noshow", "printed", "printed-noshow"] }).notNull(),
  createdAt: text("created_at").notNull(),
})

export const slots = sqliteTable("slots", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  scheduleId: text("schedule_id")
    .notNull()
    .references(() => scheduleVersions.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  judgeId: integer("judge_id").notNull(),
  start: text("starts_at").notNull(),
  end: text("ends_at").notNull(),
  team: text("team"),
  status: text("status", { enum: ["scheduled", "checked", "no-show", "rescheduled"] })
    .notNull()
    .default("scheduled"),
  between: text("gap_label"),
})

export const teamMatches = sqliteTable("team_matches", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  team: text("team").notNull(),
  position: integer("position").notNull(),
  time: text("time").notNull(),
  label: text("label").notNull(),
})

/** Ordered team lists; `list` says which one a row belongs to. */
export const teamLists = sqliteTable("team_lists", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  list: text("list", { enum: ["unassigned", "no_show", "unscheduled"] }).notNull(),
  team: text("team").notNull(),
})

export const noShowSuggestions = sqliteTable("no_show_suggestions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  team: text("team").notNull().unique(),
  gaps: text("gaps", { mode: "json" }).$type<Gap[]>().notNull(),
})

export const DDL = `
CREATE TABLE IF NOT EXISTS judging_events (
  id INTEGER PRIMARY KEY,
  judge_pairs INTEGER NOT NULL,
  slot_minutes INTEGER NOT NULL,
  block_minutes INTEGER NOT NULL,
  duration_minutes INTEGER NOT NULL,
  start_time TEXT NOT NULL,
  end_time TEXT NOT NULL,
  locked INTEGER NOT NULL DEFAULT 0,
  no_show_locked INTEGER NOT NULL DEFAULT 0,
  team_count INTEGER NOT NULL DEFAULT 0,
  active_schedule_id TEXT,
  last_suggestion_team TEXT
);
CREATE TABLE IF NOT EXISTS schedule_versions (
  id TEXT PRIMARY KEY,
  position INTEGER NOT NULL,
  label TEXT NOT NULL,
  type TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS slots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  schedule_id TEXT NOT NULL REFERENCES schedule_versions(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  judge_id INTEGER NOT NULL,
  starts_at TEXT NOT NULL,
  ends_at TEXT NOT NULL,
  team TEXT,
  status TEXT NOT NULL DEFAULT 'scheduled',
  gap_label TEXT
);
CREATE INDEX IF NOT EXISTS slots_schedule_idx ON slots (schedule_id, position);
CREATE TABLE IF NOT EXISTS team_matches (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  team TEXT NOT NULL,
  position INTEGER NOT NULL,
  time TEXT NOT NULL,
  label TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS team_lists (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  list TEXT NOT NULL,
  team TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS no_show_suggestions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  team TEXT NOT NULL UNIQUE,
  gaps TEXT NOT NULL
);
`
