import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { runExclusive } from "@/lib/db/state-store"
import { errorResponse, invalidJsonResponse, readJson, validationError } from "@/lib/judging/http"
import { snapshotRequestSchema } from "@/lib/judging/requests"
import { applySnapshotPrint } from "@/lib/judging/workflow"

export async function POST(request: Request) {
  const body = await readJson(request)
  if (!body.ok) {
    return invalidJsonResponse()
  }
  const parsed = snapshotRequestSchema.safeParse(body.value)
  if (!parsed.success) {
    return validationError(parsed.error)
  }

  try {
    const state = runExclusive(db, (current) =>
      applySnapshotPrint(current, parsed.data.label, { now: new Date() })
    )
    return NextResponse.json(state)
  } catch (error) {
    return errorResponse(error)
  }
}
