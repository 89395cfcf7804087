import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { runExclusive } from "@/lib/db/state-store"
import { errorResponse } from "@/lib/judging/http"
import { applyReset } from "@/lib/judging/workflow"

export async function POST() {
  try {
    runExclusive(db, () => applyReset())
    return NextResponse.json({})
  } catch (error) {
    return errorResponse(error)
  }
}
