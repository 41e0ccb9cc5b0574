import { z } from "zod";
import type { BookingDatabase } from "@/booking/store/db";
import { createClient } from "@/booking/store/clients";
import { createAppointmentType } from "@/booking/store/appointment-types";
import {
  countAppointmentsByStatus,
  createAppointment,
  listUpcomingAppointments,
} from "@/booking/store/appointments";
import { appendHistory } from "@/booking/store/history";
import { parseInput } from "@/booking/store/errors";
import { addDays, addMinutes } from "@/booking/store/time";
import { createChildLogger } from "@/booking/logger";
import { statusSchema } from "@/booking/types/api";
import type { AppointmentDetails, AppointmentType, StatusCounts } from "@/booking/types";
import seedData from "./seed-data.json";

const log = createChildLogger("seed");

const seedFileSchema = z.object({
  clients: z.array(
    z.object({
      firstName: z.string(),
      lastName: z.string(),
      phone: z.string(),
      email: z.string().optional(),
      secondaryPhone: z.string().optional(),
      city: z.string().optional(),
      province: z.string().optional(),
      notes: z.string().optional(),
    }),
  ),
  types: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
      durationMinutes: z.number(),
      color: z.string().optional(),
    }),
  ),
  appointments: z.array(
    z.object({
      /** Index into `clients`. */
      client: z.number().int().nonnegative(),
      type: z.string().optional(),
      dayOffset: z.number().int(),
      startTime: z.string(),
      title: z.string(),
      description: z.string().optional(),
      urgent: z.boolean().optional(),
      status: statusSchema.optional(),
    }),
  ),
});

export type SeedFile = z.infer<typeof seedFileSchema>;

export interface SeedResult {
  /** True when the store already held clients and nothing was inserted. */
  skipped: boolean;
  clients: number;
  types: number;
  appointments: number;
}

export interface StoreStatistics {
  clients: number;
  appointmentTypes: number;
  appointments: number;
  byStatus: StatusCounts;
  urgent: number;
  upcoming: AppointmentDetails[];
}

export function loadSeedFile(): SeedFile {
  return parseInput(seedFileSchema, seedData);
}

/**
 * Insert the sample clients, types and appointments in one transaction.
 * Appointment dates are offsets from `today`.
 */
export function seedDatabase(
  db: BookingDatabase,
  options: { today: string; data?: SeedFile },
): SeedResult {
  const data = options.data ?? loadSeedFile();

  if (countRows(db, "clienti") > 0) {
    log.info("Store already contains clients, skipping sample data");
    return { skipped: true, clients: 0, types: 0, appointments: 0 };
  }

  const result = db.transaction((): SeedResult => {
    const clients = data.clients.map((c) => createClient(db, c));

    const types = new Map<string, AppointmentType>();
    for (const t of data.types) {
      types.set(t.name, createAppointmentType(db, t));
    }

    for (const a of data.appointments) {
      const client = clients[a.client];
      if (!client) {
        throw new Error(`Seed appointment "${a.title}" refers to missing client #${a.client}`);
      }
      const type = a.type !== undefined ? types.get(a.type) : undefined;
      if (a.type !== undefined && !type) {
        throw new Error(`Seed appointment "${a.title}" refers to unknown type "${a.type}"`);
      }

      const appointment = createAppointment(db, {
        clientId: client.id,
        typeId: type?.id,
        date: addDays(options.today, a.dayOffset),
        startTime: a.startTime,
        endTime: addMinutes(a.startTime, type?.durationMinutes ?? 30),
        title: a.title,
        description: a.description,
        urgent: a.urgent ?? false,
        status: a.status,
      });
      appendHistory(db, appointment.id, "creazione", "Appuntamento creato");
    }

    return {
      skipped: false,
      clients: clients.length,
      types: types.size,
      appointments: data.appointments.length,
    };
  })();

  log.info("Sample data inserted", {
    clients: result.clients,
    types: result.types,
    appointments: result.appointments,
  });
  return result;
}

export function collectStatistics(db: BookingDatabase, today: string): StoreStatistics {
  const urgentRow = db
    .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM appuntamenti WHERE urgente = 1")
    .get();

  return {
    clients: countRows(db, "clienti"),
    appointmentTypes: countRows(db, "tipi_appuntamento"),
    appointments: countRows(db, "appuntamenti"),
    byStatus: countAppointmentsByStatus(db),
    urgent: urgentRow?.total ?? 0,
    upcoming: listUpcomingAppointments(db, { from: today, limit: 5, urgentFirst: true }),
  };
}

function countRows(db: BookingDatabase, table: "clienti" | "tipi_appuntamento" | "appuntamenti"): number {
  const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
  return row?.total ?? 0;
}
