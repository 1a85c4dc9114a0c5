export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad arguments. Raised before the first tick runs. */
export class ConfigurationError extends SchedulerError {}

/** Unit and ready-list bookkeeping disagree; always a scheduler bug. */
export class InvariantViolation extends SchedulerError {}

export type ParseIssue = {
  line: number;
  message: string;
};
