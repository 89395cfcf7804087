export type SchedulerErrorCode = "config" | "parse" | "not_found" | "no_feasible_slot" | "workflow"

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** Bad numeric or time configuration. Nothing is changed. */
export class ConfigError extends SchedulerError {
  constructor(message: string) {
    super("config", message)
  }
}

/** The match feed could not be read as a list of match records. */
export class ParseError extends SchedulerError {
  constructor(message: string) {
    super("parse", message)
  }
}

export class NotFoundError extends SchedulerError {
  constructor(message: string) {
    super("not_found", message)
  }
}

export class NoFeasibleSlotError extends SchedulerError {
  readonly unscheduled: string[]

  constructor(unscheduled: string[]) {
    super("no_feasible_slot", "No gaps available for no-show teams")
    this.unscheduled = unscheduled
  }
}

/** A workflow step refused in the current state (locked schedule, nothing to snapshot). */
export class WorkflowError extends SchedulerError {
  constructor(message: string) {
    super("workflow", message)
  }
}
