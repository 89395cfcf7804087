import { NextResponse } from "next/server"
import type { ZodError } from "zod"
import { NoFeasibleSlotError, SchedulerError, type SchedulerErrorCode } from "@/lib/scheduler/errors"

const STATUS_BY_CODE: Record<SchedulerErrorCode, number> = {
  config: 400,
  parse: 400,
  not_found: 404,
  no_feasible_slot: 400,
  workflow: 400,
}

export type JsonBody = { ok: true; value: unknown } | { ok: false }

/** Body of a request; an empty or `null` body reads as {}. */
export async function readJson(request: Request): Promise<JsonBody> {
  const text = await request.text()
  if (!text.trim()) return { ok: true, value: {} }
  try {
    return { ok: true, value: JSON.parse(text) ?? {} }
  } catch {
    return { ok: false }
  }
}

export function invalidJsonResponse(): NextResponse {
  return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 })
}

export function validationError(error: ZodError): NextResponse {
  const issue = error.issues[0]
  return NextResponse.json({ error: issue?.message ?? "Invalid request" }, { status: 400 })
}

export function errorResponse(error: unknown): NextResponse {
  if (error instanceof SchedulerError) {
    return NextResponse.json(
      {
        error: error.message,
        code: error.code,
        ...(error instanceof NoFeasibleSlotError && { unscheduled: error.unscheduled }),
      },
      { status: STATUS_BY_CODE[error.code] }
    )
  }
  console.error("[judging] Unexpected error:", error)
  const message = error instanceof Error ? error.message : "Unknown error occurred"
  return NextResponse.json({ error: message }, { status: 500 })
}
