export const dynamic = "force-dynamic"

import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { readState } from "@/lib/db/state-store"
import { exportToCSV, exportToExcel, toSlotViews } from "@/lib/export/export"
import type { SlotFilters } from "@/lib/export/export"
import { errorResponse, validationError } from "@/lib/judging/http"
import { exportQuerySchema } from "@/lib/judging/requests"
import { findSchedule } from "@/lib/judging/state"

export async function GET(request: Request) {
  const url = new URL(request.url)
  const parsed = exportQuerySchema.safeParse(Object.fromEntries(url.searchParams))
  if (!parsed.success) {
    return validationError(parsed.error)
  }
  const { format, scheduleId, judge, team, status } = parsed.data

  try {
    const state = readState(db)
    const version = findSchedule(state, scheduleId ?? state.activeScheduleId)
    if (!version) {
      return NextResponse.json({ error: "Schedule not found." }, { status: 404 })
    }

    const rows = toSlotViews(version)
    const filters: SlotFilters = { judge, team, status }

    if (format === "csv") {
      const csv = exportToCSV(rows, filters)
      return new Response(csv, {
        headers: {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="${version.id}.csv"`,
        },
      })
    }

    const buffer = exportToExcel(rows, version.label, filters)
    return new Response(new Uint8Array(buffer), {
      headers: {
        "Content-Type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "Content-Disposition": `attachment; filename="${version.id}.xlsx"`,
      },
    })
  } catch (error) {
    return errorResponse(error)
  }
}
