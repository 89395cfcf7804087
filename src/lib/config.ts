import path from "path"
import { z } from "zod"

const envSchema = z.object({
  DB_PATH: z.string().trim().min(1).optional(),
  DEFAULT_JUDGE_PAIRS: z.coerce.number().int().min(1).default(4),
  DEFAULT_SLOT_MINUTES: z.coerce.number().int().min(1).default(10),
  DEFAULT_BLOCK_MINUTES: z.coerce.number().int().min(0).default(8),
})

export type AppConfig = {
  dbPath: string
  defaults: {
    judgePairs: number
    slotMinutes: number
    blockMinutes: number
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid environment: ${issue.path.join(".")} ${issue.message}`)
  }
  const vars = parsed.data
  return {
    dbPath: vars.DB_PATH ?? path.join(process.cwd(), "judging.db"),
    defaults: {
      judgePairs: vars.DEFAULT_JUDGE_PAIRS,
      slotMinutes: vars.DEFAULT_SLOT_MINUTES,
      blockMinutes: vars.DEFAULT_BLOCK_MINUTES,
    },
  }
}

export const config = loadConfig()
