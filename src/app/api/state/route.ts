export const dynamic = "force-dynamic"

import { NextResponse } from "next/server"
import { db } from "@/lib/db/connection"
import { readState } from "@/lib/db/state-store"
import { errorResponse } from "@/lib/judging/http"

export async function GET() {
  try {
    return NextResponse.json(readState(db))
  } catch (error) {
    return errorResponse(error)
  }
}
