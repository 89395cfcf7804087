import { config } from "@/lib/config"
import { openDatabase } from "./open"

const opened = openDatabase(config.dbPath)

export const db = opened.db
export const sqlite = opened.sqlite
