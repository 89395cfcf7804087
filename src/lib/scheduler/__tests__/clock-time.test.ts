import { describe, it, expect } from "vitest"
import { parseClockTime } from "../clock-time"
import { ConfigError } from "../errors"

describe("parseClockTime", () => {
  const reference = new Date(2025, 2, 1, 7, 45)

  it("parses 12-hour times onto the reference day", () => {
    expect(parseClockTime("9:00 AM", "judging start time", reference)).toEqual(new Date(2025, 2, 1, 9, 0))
    expect(parseClockTime("1:05pm", "judging start time", reference)).toEqual(new Date(2025, 2, 1, 13, 5))
  })

  it("maps 12 AM to midnight and 12 PM to noon", () => {
    expect(parseClockTime("12:15 AM", "judging start time", reference)).toEqual(new Date(2025, 2, 1, 0, 15))
    expect(parseClockTime("12:30 PM", "judging start time", reference)).toEqual(new Date(2025, 2, 1, 12, 30))
  })

  it("parses 24-hour times", () => {
    expect(parseClockTime(" 13:30 ", "judging end time", reference)).toEqual(new Date(2025, 2, 1, 13, 30))
  })

  it("reports a missing time", () => {
    expect(() => parseClockTime("  ", "judging start time", reference)).toThrow("Missing judging start time.")
  })

  it("reports out-of-range values", () => {
    expect(() => parseClockTime("13:00 PM", "judging end time", reference)).toThrow("Invalid judging end time.")
    expect(() => parseClockTime("24:00", "judging end time", reference)).toThrow("Invalid judging end time.")
  })

  it("reports unrecognized formats", () => {
    expect(() => parseClockTime("9am", "judging start time", reference)).toThrow(ConfigError)
    expect(() => parseClockTime("9am", "judging start time", reference)).toThrow(
      "Judging start time must be like 9:00 AM."
    )
  })
})
