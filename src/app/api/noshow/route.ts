import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { runExclusive } from "@/lib/db/state-store"
import { errorResponse, invalidJsonResponse, readJson, validationError } from "@/lib/judging/http"
import { teamRequestSchema } from "@/lib/judging/requests"
import { applyNoShow } from "@/lib/judging/workflow"

export async function POST(request: Request) {
  const body = await readJson(request)
  if (!body.ok) {
    return invalidJsonResponse()
  }
  const parsed = teamRequestSchema.safeParse(body.value)
  if (!parsed.success) {
    return validationError(parsed.error)
  }

  try {
    const state = runExclusive(db, (current) => applyNoShow(current, parsed.data.team))
    return NextResponse.json(state)
  } catch (error) {
    return errorResponse(error)
  }
}
