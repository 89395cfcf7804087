import * as XLSX from "xlsx"
import type { ScheduleVersion, SlotStatus } from "@/lib/scheduler/types"

export interface SlotView {
  judge: number
  /** Local "HH:MM" */
  start: string
  end: string
  team: string
  status: SlotStatus
  between: string
}

export interface SlotFilters {
  judge?: number
  team?: string
  status?: SlotStatus
}

function clock(timestamp: string): string {
  const d = new Date(timestamp)
  return `${String(d.getHours()).padStart(2, "0")}:${String(d.getMinutes()).padStart(2, "0")}`
}

/** One row per slot, by judge then start time. */
export function toSlotViews(version: ScheduleVersion): SlotView[] {
  return [...version.slots]
    .sort((a, b) => a.judgeId - b.judgeId || Date.parse(a.start) - Date.parse(b.start))
    .map((s) => ({
      judge: s.judgeId,
      start: clock(s.start),
      end: clock(s.end),
      team: s.team ?? "",
      status: s.status,
      between: s.between ?? "",
    }))
}

export function filterSlots(rows: SlotView[], filters?: SlotFilters): SlotView[] {
  if (!filters) return rows

  return rows.filter((r) => {
    if (filters.judge !== undefined && r.judge !== filters.judge) return false
    if (filters.team && r.team !== filters.team) return false
    if (filters.status && r.status !== filters.status) return false
    return true
  })
}

const HEADERS = ["Judge", "Start", "End", "Team", "Status", "Between"] as const

function escapeCSVField(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function slotToRow(r: SlotView): string[] {
  return [`Judge ${r.judge}`, r.start, r.end, r.team, r.status, r.between]
}

export function exportToCSV(rows: SlotView[], filters?: SlotFilters): string {
  const filtered = filterSlots(rows, filters)
  const headerLine = HEADERS.join(",")
  const dataLines = filtered.map((r) => slotToRow(r).map(escapeCSVField).join(","))
  return [headerLine, ...dataLines].join("\n")
}

/** Sheet names are capped at 31 characters and may not contain : \ / ? * [ ] */
export function toSheetName(label: string): string {
  return label.replace(/[:\\/?*[\]]/g, " ").slice(0, 31).trim() || "Schedule"
}

export function exportToExcel(rows: SlotView[], sheetName: string, filters?: SlotFilters): Buffer {
  const filtered = filterSlots(rows, filters)
  const data = [[...HEADERS], ...filtered.map((r) => slotToRow(r))]

  const workbook = XLSX.utils.book_new()
  const sheet = XLSX.utils.aoa_to_sheet(data)
  XLSX.utils.book_append_sheet(workbook, sheet, toSheetName(sheetName))

  const written: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" })
  if (!Buffer.isBuffer(written)) {
    throw new Error("Excel export did not produce a buffer")
  }
  return written
}
