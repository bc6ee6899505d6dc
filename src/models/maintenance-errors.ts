/**
 * Raised for any failure talking to the Mesos master: connection errors,
 * timeouts, non-2xx statuses and bodies that do not decode.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Base class for maintenance schedule policy failures. These are reported to
 * the user as a single line rather than a stack trace.
 */
export class ScheduleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleError";
  }
}

/** The machine is already scheduled or draining. */
export class ScheduleConflictError extends ScheduleError {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleConflictError";
  }
}

/** The machine is not part of any maintenance window. */
export class ScheduleNotFoundError extends ScheduleError {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleNotFoundError";
  }
}
