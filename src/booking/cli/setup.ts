import fs from "fs";
import path from "path";
import * as p from "@clack/prompts";
import { openDatabase, closeDatabase, type BookingDatabase } from "@/booking/store/db";
import { seedDatabase, collectStatistics, type StoreStatistics } from "@/booking/seed";
import { today } from "@/booking/store/time";
import { APPOINTMENT_STATUSES } from "@/booking/types";

export interface SetupOptions {
  dbPath: string;
  seed: boolean;
}

export function formatStatistics(stats: StoreStatistics): string[] {
  const lines = [
    `Clients: ${stats.clients}`,
    `Appointment types: ${stats.appointmentTypes}`,
    `Appointments: ${stats.appointments}`,
  ];
  for (const status of APPOINTMENT_STATUSES) {
    if (stats.byStatus[status] > 0) {
      lines.push(`  - ${status}: ${stats.byStatus[status]}`);
    }
  }
  lines.push(`Urgent: ${stats.urgent}`);

  if (stats.upcoming.length > 0) {
    lines.push("Next appointments:");
    for (const a of stats.upcoming) {
      const urgent = a.urgent ? " [URGENT]" : "";
      lines.push(`  - ${a.date} ${a.startTime} ${a.title} (${a.client.firstName} ${a.client.lastName})${urgent}`);
    }
  }
  return lines;
}

/**
 * Create the store if it does not exist, optionally insert the sample data
 * and print what the store now holds. Errors are rethrown so the process
 * exits non-zero.
 */
export async function runSetup(options: SetupOptions): Promise<void> {
  p.intro("Booking calendar setup");

  const resolved = path.resolve(options.dbPath);
  const existed = fs.existsSync(resolved);

  let db: BookingDatabase;
  try {
    db = openDatabase(resolved);
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    p.outro("Could not open the database.");
    throw error;
  }
  p.log.success(existed ? `Using existing database ${resolved}` : `Database created at ${resolved}`);

  try {
    const day = today();

    if (options.seed) {
      const seedSpinner = p.spinner();
      seedSpinner.start("Inserting sample data...");
      try {
        const result = seedDatabase(db, { today: day });
        if (result.skipped) {
          seedSpinner.stop("Database already has clients, sample data not inserted.");
        } else {
          seedSpinner.stop("Sample data inserted.");
          p.log.success(`Inserted ${result.clients} clients`);
          p.log.success(`Inserted ${result.types} appointment types`);
          p.log.success(`Inserted ${result.appointments} appointments`);
        }
      } catch (error) {
        seedSpinner.stop("Seeding failed.");
        p.log.error(error instanceof Error ? error.message : String(error));
        throw error;
      }
    }

    p.log.info("Database statistics:");
    for (const line of formatStatistics(collectStatistics(db, day))) {
      p.log.message(line);
    }
  } finally {
    closeDatabase(db);
  }

  p.outro("Done!");
}
