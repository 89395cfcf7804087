import { z } from "zod"
import { config } from "@/lib/config"

const teamNumber = z
  .union([z.string(), z.number()], { required_error: "Missing team." })
  .transform((v) => String(v).trim())
  .pipe(z.string().min(1, "Missing team."))

export const generateRequestSchema = z.object({
  judgePairs: z.coerce.number().default(config.defaults.judgePairs),
  slotMinutes: z.coerce.number().default(config.defaults.slotMinutes),
  blockMinutes: z.coerce.number().min(0).default(config.defaults.blockMinutes),
  startTime: z.string({ required_error: "Missing judging start time." }),
  endTime: z.string({ required_error: "Missing judging end time." }),
  matchSchedule: z.string().default(""),
})

export const teamRequestSchema = z.object({
  team: teamNumber,
})

export const activeScheduleRequestSchema = z.object({
  scheduleId: z
    .string({ required_error: "Missing schedule id." })
    .trim()
    .min(1, "Missing schedule id."),
})

export const snapshotRequestSchema = z.object({
  label: z.string().optional(),
})

const slotStatus = z.enum(["scheduled", "checked", "no-show", "rescheduled"])

export const exportQuerySchema = z.object({
  format: z.enum(["csv", "excel"], {
    errorMap: () => ({ message: 'format query param is required and must be "csv" or "excel"' }),
  }),
  scheduleId: z.string().optional(),
  judge: z.coerce.number().int().min(1).optional(),
  team: z.string().optional(),
  status: slotStatus.optional(),
})
