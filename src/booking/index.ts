import { z } from "zod";
import type { BookingDatabase } from "@/booking/store/db";
import {
  ConstraintViolationError,
  ReferenceViolationError,
  SlotConflictError,
  parseInput,
} from "@/booking/store/errors";
import {
  countAppointmentsByStatus,
  createAppointment,
  deleteAppointment,
  findConflicts,
  getAppointment,
  getAppointmentDetails,
  listAppointments,
  listAppointmentsOn,
  listUpcomingAppointments,
  updateAppointment,
  type DeletedAppointment,
} from "@/booking/store/appointments";
import { findAppointmentType } from "@/booking/store/appointment-types";
import { findClient, getClient } from "@/booking/store/clients";
import { appendHistory } from "@/booking/store/history";
import { addMinutes, minutesBetween, today } from "@/booking/store/time";
import { getEnv } from "@/booking/config/env";
import { createChildLogger } from "@/booking/logger";
import {
  idSchema,
  isoDateSchema,
  statusSchema,
  timeSchema,
} from "@/booking/types/api";
import type { AppointmentChanges, AppointmentFilter } from "@/booking/types/api";
import type {
  Appointment,
  AppointmentDetails,
  AppointmentStatus,
  BookingPolicy,
  Client,
  KnownChangeType,
  StatusCounts,
} from "@/booking/types";

const log = createChildLogger("booking");

const DEFAULT_DURATION_MINUTES = 30;

export interface BookingContext {
  db: BookingDatabase;
  policy: BookingPolicy;
}

/** Build a context whose policy comes from the environment, with explicit overrides on top. */
export function createBookingContext(db: BookingDatabase, overrides: Partial<BookingPolicy> = {}): BookingContext {
  const env = getEnv();
  return {
    db,
    policy: {
      historyOnDelete: env.BOOKING_HISTORY_ON_DELETE,
      checkConflicts: env.BOOKING_CHECK_CONFLICTS,
      defaultLocation: env.BOOKING_DEFAULT_LOCATION || null,
      ...overrides,
    },
  };
}

export const scheduleRequestSchema = z.object({
  clientId: idSchema,
  typeId: idSchema.optional(),
  date: isoDateSchema,
  startTime: timeSchema,
  /** Takes precedence over the duration when given. */
  endTime: timeSchema.optional(),
  durationMinutes: z.number().int().positive().optional(),
  title: z.string().trim().min(1, "Title is required"),
  description: z.string().optional(),
  location: z.string().optional(),
  notes: z.string().optional(),
  urgent: z.boolean().optional(),
  status: statusSchema.optional(),
});

export type ScheduleRequest = z.input<typeof scheduleRequestSchema>;

export const modifyRequestSchema = z.object({
  typeId: idSchema.nullable().optional(),
  date: isoDateSchema.optional(),
  startTime: timeSchema.optional(),
  durationMinutes: z.number().int().positive().optional(),
  title: z.string().trim().min(1, "Title must not be blank").optional(),
  description: z.string().nullable().optional(),
  location: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
  status: statusSchema.optional(),
  urgent: z.boolean().optional(),
});

export type ModifyRequest = z.input<typeof modifyRequestSchema>;

export interface ModifiedAppointment {
  appointment: AppointmentDetails;
  changes: string[];
}

export interface DailySchedule {
  date: string;
  total: number;
  stats: { urgent: number; confirmed: number; completed: number };
  appointments: AppointmentDetails[];
}

export interface ClientDetails {
  client: Client;
  recentAppointments: AppointmentDetails[];
  counts: StatusCounts & { total: number };
}

// --- Scheduling ---

/**
 * Book an appointment. The end time is derived from the duration (explicit,
 * then the type's standard one, then 30 minutes) unless given directly.
 * Writes a "creazione" history entry in the same transaction.
 */
export function scheduleAppointment(ctx: BookingContext, request: ScheduleRequest): AppointmentDetails {
  const data = parseInput(scheduleRequestSchema, request);
  const { db, policy } = ctx;

  const client = findClient(db, data.clientId);
  if (!client) {
    throw new ReferenceViolationError(`Client ${data.clientId} does not exist`);
  }
  const type = data.typeId !== undefined ? findAppointmentType(db, data.typeId) : undefined;
  if (data.typeId !== undefined && !type) {
    throw new ReferenceViolationError(`Appointment type ${data.typeId} does not exist`);
  }
  const duration = data.durationMinutes ?? type?.durationMinutes ?? DEFAULT_DURATION_MINUTES;
  const endTime = data.endTime ?? addMinutes(data.startTime, duration);
  assertEndsAfterStart(data.startTime, endTime);

  const appointment = db.transaction((): Appointment => {
    if (policy.checkConflicts && occupiesSlot(data.status ?? "confermato")) {
      assertSlotFree(ctx, { date: data.date, startTime: data.startTime, endTime });
    }
    const created = createAppointment(db, {
      clientId: client.id,
      typeId: type?.id,
      date: data.date,
      startTime: data.startTime,
      endTime,
      title: data.title,
      description: data.description,
      location: data.location ?? policy.defaultLocation ?? undefined,
      notes: data.notes,
      urgent: data.urgent ?? false,
      status: data.status,
    });
    record(ctx, created.id, "creazione", "Appuntamento creato");
    return created;
  })();

  log.info("Appointment scheduled", {
    id: appointment.id,
    client: `${client.firstName} ${client.lastName}`,
    date: appointment.date,
    startTime: appointment.startTime,
  });
  return getAppointmentDetails(db, appointment.id);
}

/**
 * Change an appointment. Moving the start keeps the previous duration unless a
 * new one is given; the history entry lists every change made.
 */
export function modifyAppointment(ctx: BookingContext, id: number, request: ModifyRequest): ModifiedAppointment {
  const data = parseInput(modifyRequestSchema, request);
  const { db, policy } = ctx;
  const current = getAppointment(db, id);

  const changes: AppointmentChanges = {};
  const descriptions: string[] = [];

  if (data.date !== undefined) {
    changes.date = data.date;
    descriptions.push(`Data modificata in ${data.date}`);
  }

  if (data.startTime !== undefined || data.durationMinutes !== undefined) {
    const startTime = data.startTime ?? current.startTime;
    const duration = data.durationMinutes ?? minutesBetween(current.startTime, current.endTime);
    const endTime = addMinutes(startTime, duration);
    assertEndsAfterStart(startTime, endTime);
    changes.startTime = startTime;
    changes.endTime = endTime;
    descriptions.push(`Orario modificato: ${startTime} - ${endTime}`);
  }

  if (data.title !== undefined) {
    changes.title = data.title;
    descriptions.push("Titolo modificato");
  }
  if (data.description !== undefined) {
    changes.description = data.description;
    descriptions.push("Descrizione aggiornata");
  }
  if (data.typeId !== undefined) {
    changes.typeId = data.typeId;
    descriptions.push(data.typeId === null ? "Tipo rimosso" : `Tipo cambiato in ${data.typeId}`);
  }
  if (data.location !== undefined) {
    changes.location = data.location;
    descriptions.push("Luogo aggiornato");
  }
  if (data.status !== undefined) {
    changes.status = data.status;
    descriptions.push(`Stato cambiato in ${data.status}`);
  }
  if (data.urgent !== undefined) {
    changes.urgent = data.urgent;
    descriptions.push(`Urgenza: ${data.urgent ? "SI" : "NO"}`);
  }
  if (data.notes !== undefined) {
    changes.notes = data.notes;
    descriptions.push("Note aggiornate");
  }

  if (descriptions.length === 0) {
    throw new ConstraintViolationError("No changes specified");
  }

  db.transaction(() => {
    assertSlotFreeAfter(ctx, current, {
      date: changes.date ?? current.date,
      startTime: changes.startTime ?? current.startTime,
      endTime: changes.endTime ?? current.endTime,
      status: changes.status ?? current.status,
    });
    updateAppointment(db, current.id, changes, policy.canTransition);
    record(ctx, current.id, "modifica", descriptions.join("; "));
  })();

  log.info("Appointment modified", { id: current.id, changes: descriptions });
  return { appointment: getAppointmentDetails(db, current.id), changes: descriptions };
}

export function completeAppointment(ctx: BookingContext, id: number, notes?: string): AppointmentDetails {
  const { db, policy } = ctx;
  const current = getAppointment(db, id);

  const changes: AppointmentChanges = { status: "completato" };
  if (notes !== undefined) changes.notes = notes;

  db.transaction(() => {
    assertSlotFreeAfter(ctx, current, {
      date: current.date,
      startTime: current.startTime,
      endTime: current.endTime,
      status: "completato",
    });
    updateAppointment(db, current.id, changes, policy.canTransition);
    record(ctx, current.id, "completamento", "Appuntamento completato");
  })();

  log.info("Appointment completed", { id: current.id });
  return getAppointmentDetails(db, current.id);
}

/** Soft cancel: the row stays, with status "cancellato". */
export function cancelAppointment(ctx: BookingContext, id: number, reason?: string): AppointmentDetails {
  const { db, policy } = ctx;
  const current = getAppointment(db, id);

  db.transaction(() => {
    updateAppointment(db, current.id, { status: "cancellato" }, policy.canTransition);
    record(
      ctx,
      current.id,
      "cancellazione",
      reason ? `Appuntamento cancellato. Motivo: ${reason}` : "Appuntamento cancellato",
    );
  })();

  log.info("Appointment cancelled", { id: current.id, reason });
  return getAppointmentDetails(db, current.id);
}

/** Hard delete, applying the configured history policy. */
export function removeAppointment(ctx: BookingContext, id: number): DeletedAppointment {
  const result = deleteAppointment(ctx.db, id, ctx.policy.historyOnDelete);
  log.info("Appointment deleted", {
    id: result.appointment.id,
    removedHistoryEntries: result.removedHistoryEntries,
  });
  return result;
}

/** Record that a reminder went out. Delivery itself happens elsewhere. */
export function markReminderSent(ctx: BookingContext, id: number): Appointment {
  return updateAppointment(ctx.db, id, { reminderSent: true });
}

// --- Queries ---

/** Defaults to appointments from today onwards. */
export function findAppointments(ctx: BookingContext, filter: AppointmentFilter = {}): AppointmentDetails[] {
  return listAppointments(ctx.db, { ...filter, from: filter.from ?? today() });
}

export function getDailySchedule(ctx: BookingContext, date: string = today()): DailySchedule {
  const appointments = listAppointmentsOn(ctx.db, date);
  return {
    date,
    total: appointments.length,
    stats: {
      urgent: appointments.filter((a) => a.urgent).length,
      confirmed: appointments.filter((a) => a.status === "confermato").length,
      completed: appointments.filter((a) => a.status === "completato").length,
    },
    appointments,
  };
}

export function getClientDetails(ctx: BookingContext, clientId: number): ClientDetails {
  const client = getClient(ctx.db, clientId);
  const recentAppointments = listAppointments(ctx.db, { clientId: client.id })
    .reverse()
    .slice(0, 20);
  const counts = countAppointmentsByStatus(ctx.db, { clientId: client.id });
  const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
  return { client, recentAppointments, counts: { ...counts, total } };
}

export function upcomingAppointments(
  ctx: BookingContext,
  options: { from?: string; clientId?: number; limit?: number } = {},
): AppointmentDetails[] {
  return listUpcomingAppointments(ctx.db, {
    from: options.from ?? today(),
    clientId: options.clientId,
    limit: options.limit ?? 5,
  });
}

// --- Internal helpers ---

function record(ctx: BookingContext, appointmentId: number, changeType: KnownChangeType, description: string): void {
  appendHistory(ctx.db, appointmentId, changeType, description);
}

function assertSlotFree(
  ctx: BookingContext,
  slot: { date: string; startTime: string; endTime: string; excludeId?: number },
): void {
  const conflicts = findConflicts(ctx.db, slot);
  if (conflicts.length > 0) {
    log.warn("Slot conflict", { ...slot, conflicts: conflicts.map((a) => a.id) });
    throw new SlotConflictError(conflicts);
  }
}

/** Cancelled and no-show appointments leave their slot free. */
function occupiesSlot(status: AppointmentStatus): boolean {
  return status !== "cancellato" && status !== "non_presentato";
}

/**
 * Check the slot an appointment will hold after a change. Only needed when it
 * keeps holding a slot and that slot is new to it: moved, or taken back from
 * a cancelled or no-show status.
 */
function assertSlotFreeAfter(
  ctx: BookingContext,
  current: Appointment,
  next: { date: string; startTime: string; endTime: string; status: AppointmentStatus },
): void {
  if (!ctx.policy.checkConflicts || !occupiesSlot(next.status)) return;

  const moved =
    next.date !== current.date || next.startTime !== current.startTime || next.endTime !== current.endTime;
  if (moved || !occupiesSlot(current.status)) {
    assertSlotFree(ctx, { date: next.date, startTime: next.startTime, endTime: next.endTime, excludeId: current.id });
  }
}

function assertEndsAfterStart(startTime: string, endTime: string): void {
  if (minutesBetween(startTime, endTime) <= 0) {
    throw new ConstraintViolationError(`End time ${endTime} must be after start time ${startTime}`);
  }
}
