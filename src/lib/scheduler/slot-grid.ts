import { ConfigError } from "./errors"
import { MINUTE_MS, toMillis, toTimestamp } from "./clock-time"
import type { Slot } from "./types"

export interface SlotGridInput {
  judgeCount: number
  /** ISO-8601 start of the judging window */
  windowStart: string
  durationMinutes: number
  slotMinutes: number
}

export function validateJudgeCount(judgeCount: number): void {
  if (!Number.isInteger(judgeCount) || judgeCount < 1) {
    throw new ConfigError(`Judge pairs must be a positive whole number, got ${judgeCount}`)
  }
}

/**
 * Builds every judge's slot grid: `floor(duration / slotMinutes)` back-to-back
 * slots per judge, judges 1..judgeCount, each grid ascending from windowStart.
 */
export function buildSlotGrid(input: SlotGridInput): Slot[] {
  const { judgeCount, windowStart, durationMinutes, slotMinutes } = input

  validateJudgeCount(judgeCount)
  if (!(slotMinutes > 0)) {
    throw new ConfigError(`Slot length must be greater than zero, got ${slotMinutes}`)
  }
  if (!(durationMinutes > 0)) {
    throw new ConfigError("Judging end time must be after the start time.")
  }
  const startMs = toMillis(windowStart)
  if (Number.isNaN(startMs)) {
    throw new ConfigError(`Invalid judging start time: ${windowStart}`)
  }

  const slotsPerJudge = Math.floor(durationMinutes / slotMinutes)
  const slotMs = slotMinutes * MINUTE_MS

  const slots: Slot[] = []
  for (let judgeId = 1; judgeId <= judgeCount; judgeId++) {
    for (let i = 0; i < slotsPerJudge; i++) {
      const slotStart = startMs + i * slotMs
      slots.push({
        judgeId,
        start: toTimestamp(slotStart),
        end: toTimestamp(slotStart + slotMs),
        team: null,
        status: "scheduled",
      })
    }
  }
  return slots
}
