import { openDatabase, type BookingDatabase } from "@/booking/store/db";
import { createClient } from "@/booking/store/clients";
import { createAppointmentType } from "@/booking/store/appointment-types";
import type { BookingContext } from "@/booking";
import type { AppointmentType, BookingPolicy, Client } from "@/booking/types";

export function openTestDatabase(): BookingDatabase {
  return openDatabase(":memory:");
}

export function testContext(db: BookingDatabase, policy: Partial<BookingPolicy> = {}): BookingContext {
  return {
    db,
    policy: {
      historyOnDelete: "cascade",
      checkConflicts: true,
      defaultLocation: "Studio Principale",
      ...policy,
    },
  };
}

export function addMario(db: BookingDatabase): Client {
  return createClient(db, { firstName: "Mario", lastName: "Rossi", phone: "333-1111" });
}

export function addConsulenza(db: BookingDatabase): AppointmentType {
  return createAppointmentType(db, { name: "Consulenza", durationMinutes: 60 });
}
