import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { runExclusive } from "@/lib/db/state-store"
import { errorResponse, invalidJsonResponse, readJson, validationError } from "@/lib/judging/http"
import { generateRequestSchema } from "@/lib/judging/requests"
import { applyGenerate } from "@/lib/judging/workflow"

export async function POST(request: Request) {
  const body = await readJson(request)
  if (!body.ok) {
    return invalidJsonResponse()
  }
  const parsed = generateRequestSchema.safeParse(body.value)
  if (!parsed.success) {
    return validationError(parsed.error)
  }

  try {
    const state = runExclusive(db, (current) =>
      applyGenerate(current, parsed.data, { now: new Date() })
    )
    return NextResponse.json(state)
  } catch (error) {
    return errorResponse(error)
  }
}
