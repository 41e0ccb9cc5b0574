import type { z } from "zod";
import type { Appointment, AppointmentStatus } from "../types";

export type BookingErrorCode =
  | "CONSTRAINT_VIOLATION"
  | "REFERENCE_ERROR"
  | "NOT_FOUND"
  | "SLOT_CONFLICT"
  | "INVALID_TRANSITION";

export class BookingError extends Error {
  readonly code: BookingErrorCode;

  constructor(code: BookingErrorCode, message: string) {
    super(message);
    this.name = "BookingError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Uniqueness, required-field or format violation. */
export class ConstraintViolationError extends BookingError {
  constructor(message: string) {
    super("CONSTRAINT_VIOLATION", message);
    this.name = "ConstraintViolationError";
  }
}

/** A foreign key that does not resolve, or a row that is still referenced. */
export class ReferenceViolationError extends BookingError {
  constructor(message: string) {
    super("REFERENCE_ERROR", message);
    this.name = "ReferenceViolationError";
  }
}

export class NotFoundError extends BookingError {
  constructor(entity: string, id: number | string) {
    super("NOT_FOUND", `${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class SlotConflictError extends BookingError {
  readonly conflicts: Appointment[];

  constructor(conflicts: Appointment[]) {
    const titles = conflicts.map((a) => `"${a.title}" (${a.startTime}-${a.endTime})`).join(", ");
    super("SLOT_CONFLICT", `Conflicts with existing appointment: ${titles}`);
    this.name = "SlotConflictError";
    this.conflicts = conflicts;
  }
}

export class StatusTransitionError extends BookingError {
  constructor(from: AppointmentStatus, to: AppointmentStatus) {
    super("INVALID_TRANSITION", `Status change from ${from} to ${to} is not allowed`);
    this.name = "StatusTransitionError";
  }
}

/** Validate caller input, reporting every failing field at once. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConstraintViolationError(details);
  }
  return result.data;
}

interface ConstraintMessages {
  unique?: string;
  foreignKey?: string;
}

interface SqliteFailure {
  code: string;
  message: string;
}

/**
 * Map SQLite constraint failures onto the booking error taxonomy.
 * Anything that is not a constraint failure is returned untouched.
 * Failures are recognised by their code, not their class: every load of the
 * driver (one per Jest module registry) carries its own SqliteError.
 */
export function translateSqliteError(error: unknown, messages: ConstraintMessages = {}): unknown {
  if (!isSqliteFailure(error)) return error;

  switch (error.code) {
    case "SQLITE_CONSTRAINT_UNIQUE":
      return new ConstraintViolationError(messages.unique ?? error.message);
    case "SQLITE_CONSTRAINT_FOREIGNKEY":
      return new ReferenceViolationError(messages.foreignKey ?? error.message);
    case "SQLITE_CONSTRAINT_NOTNULL":
    case "SQLITE_CONSTRAINT_CHECK":
      return new ConstraintViolationError(error.message);
    default:
      return error;
  }
}

function isSqliteFailure(error: unknown): error is SqliteFailure {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("SQLITE_") &&
    "message" in error &&
    typeof error.message === "string"
  );
}
