import { z } from "zod"
import { ParseError } from "./errors"

const looseNumber = z.union([z.number(), z.string()])

/** Latest instant a Date can hold, in seconds */
const MAX_EPOCH_SECONDS = 8.64e12

const epochSeconds = z.number().nonnegative().max(MAX_EPOCH_SECONDS, "is out of range")

const teamSchema = z.object({
  number: looseNumber.nullish(),
})

const allianceSchema = z.object({
  teams: z.array(teamSchema).optional(),
})

const matchInfoSchema = z.object({
  /** Epoch seconds; unscheduled placeholders carry null or nothing */
  timeScheduled: z
    .union([
      epochSeconds,
      z.string().regex(/^\d+$/, "must be epoch seconds").transform(Number).pipe(epochSeconds),
    ])
    .nullish(),
  matchTuple: z
    .object({
      round: looseNumber.nullish(),
      match: looseNumber.nullish(),
    })
    .optional(),
  alliances: z.array(allianceSchema).optional(),
})

export const matchRecordSchema = z.object({
  matchInfo: matchInfoSchema.optional(),
})

export type MatchRecord = z.infer<typeof matchRecordSchema>

const matchListSchema = z.array(matchRecordSchema)

/** Key under which a feed document may wrap its match list. */
export const MATCH_LIST_KEY = "Matches"

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

function unwrapMatchList(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value
  if (value !== null && typeof value === "object" && MATCH_LIST_KEY in value) {
    const wrapped: unknown = Reflect.get(value, MATCH_LIST_KEY)
    if (Array.isArray(wrapped)) return wrapped
  }
  return null
}

function validateMatchList(list: unknown[]): MatchRecord[] {
  const result = matchListSchema.safeParse(list)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new ParseError(`Invalid match record${where}: ${issue.message}`)
  }
  return result.data
}

/**
 * Last-resort stage for feeds pasted with surrounding log lines: returns the
 * text from the first "[" to the last "]", or null when there is none.
 * With several arrays in the text this can span more than one of them.
 */
export function extractFirstArray(text: string): string | null {
  const match = /\[(.*)\]/s.exec(text)
  if (!match) return null
  return `[${match[1]}]`
}

/**
 * Reads a match-schedule feed: a JSON array of match records, or an object
 * wrapping one under "Matches". Anything else goes through
 * {@link extractFirstArray}.
 */
export function parseMatchFeed(raw: string): MatchRecord[] {
  const direct = tryParseJson(raw)
  if (direct.ok) {
    const list = unwrapMatchList(direct.value)
    if (list) return validateMatchList(list)
  }

  const arrayText = extractFirstArray(raw)
  if (arrayText === null) {
    throw new ParseError("Could not find JSON array in match schedule input.")
  }
  const extracted = tryParseJson(arrayText)
  if (!extracted.ok || !Array.isArray(extracted.value)) {
    throw new ParseError("Match schedule input contains a malformed JSON array.")
  }
  return validateMatchList(extracted.value)
}
