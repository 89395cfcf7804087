import { ConfigError } from "./errors"

export const MINUTE_MS = 60_000

export function toMillis(timestamp: string): number {
  return Date.parse(timestamp)
}

export function toTimestamp(ms: number): string {
  return new Date(ms).toISOString()
}

const MERIDIEM_PATTERN = /^(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/
const TWENTY_FOUR_HOUR_PATTERN = /^(\d{1,2}):(\d{2})$/

/**
 * Parses an operator-entered time of day ("9:00 AM", "1:30pm", "13:30")
 * onto the calendar day of `reference`, in the server's local time zone.
 */
export function parseClockTime(raw: string, label: string, reference: Date = new Date()): Date {
  const text = raw.trim()
  if (!text) {
    throw new ConfigError(`Missing ${label}.`)
  }

  let hour: number
  let minute: number

  const meridiem = MERIDIEM_PATTERN.exec(text)
  const plain = TWENTY_FOUR_HOUR_PATTERN.exec(text)
  if (meridiem) {
    hour = Number(meridiem[1])
    minute = Number(meridiem[2])
    if (hour < 1 || hour > 12 || minute > 59) {
      throw new ConfigError(`Invalid ${label}.`)
    }
    const isPm = meridiem[3].toLowerCase() === "pm"
    if (isPm && hour !== 12) hour += 12
    if (!isPm && hour === 12) hour = 0
  } else if (plain) {
    hour = Number(plain[1])
    minute = Number(plain[2])
    if (hour > 23 || minute > 59) {
      throw new ConfigError(`Invalid ${label}.`)
    }
  } else {
    throw new ConfigError(`${label.charAt(0).toUpperCase()}${label.slice(1)} must be like 9:00 AM.`)
  }

  return new Date(
    reference.getFullYear(),
    reference.getMonth(),
    reference.getDate(),
    hour,
    minute
  )
}
