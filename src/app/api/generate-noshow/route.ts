import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { runExclusive } from "@/lib/db/state-store"
import { errorResponse } from "@/lib/judging/http"
import { applyGenerateNoShow } from "@/lib/judging/workflow"

export async function POST() {
  try {
    const state = runExclusive(db, (current) => applyGenerateNoShow(current, { now: new Date() }))
    return NextResponse.json(state)
  } catch (error) {
    return errorResponse(error)
  }
}
