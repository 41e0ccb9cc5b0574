export const APPOINTMENT_STATUSES = [
  "confermato",
  "completato",
  "cancellato",
  "in_attesa",
  "non_presentato",
] as const;

export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export interface Client {
  id: number;
  firstName: string;
  lastName: string;
  email: string | null;
  phone: string;
  secondaryPhone: string | null;
  street: string | null;
  streetNumber: string | null;
  city: string | null;
  postalCode: string | null;
  province: string | null;
  notes: string | null;
  registeredAt: string;
  active: boolean;
}

export interface AppointmentType {
  id: number;
  name: string;
  description: string | null;
  durationMinutes: number;
  color: string | null;
}

export interface Appointment {
  id: number;
  clientId: number;
  typeId: number | null;
  date: string;
  startTime: string;
  endTime: string;
  title: string;
  description: string | null;
  location: string | null;
  notes: string | null;
  urgent: boolean;
  status: AppointmentStatus;
  reminderSent: boolean;
  createdAt: string;
  updatedAt: string;
}

/** An appointment joined with the client it belongs to and its type, if any. */
export interface AppointmentDetails extends Appointment {
  client: {
    firstName: string;
    lastName: string;
    phone: string;
    email: string | null;
  };
  typeName: string | null;
  typeColor: string | null;
}

export interface ChangeHistoryEntry {
  id: number;
  appointmentId: number;
  changeType: string;
  description: string | null;
  changedAt: string;
}

// Labels written by the booking operations; the column itself is free text
export type KnownChangeType = "creazione" | "modifica" | "completamento" | "cancellazione";

export type HistoryOnDelete = "cascade" | "restrict";

export type TransitionGuard = (from: AppointmentStatus, to: AppointmentStatus) => boolean;

export interface BookingPolicy {
  historyOnDelete: HistoryOnDelete;
  checkConflicts: boolean;
  defaultLocation: string | null;
  /** Unset means every status may move to every other status. */
  canTransition?: TransitionGuard;
}

export interface StatusCounts {
  confermato: number;
  completato: number;
  cancellato: number;
  in_attesa: number;
  non_presentato: number;
}
