import type { BookingDatabase } from "./db";
import {
  ConstraintViolationError,
  NotFoundError,
  ReferenceViolationError,
  StatusTransitionError,
  parseInput,
  translateSqliteError,
} from "./errors";
import { findClient } from "./clients";
import { findAppointmentType } from "./appointment-types";
import { countHistory } from "./history";
import { collectAssignments, likePattern, type SqlValue } from "./sql";
import {
  appointmentChangesSchema,
  appointmentFilterSchema,
  idSchema,
  isoDateSchema,
  newAppointmentSchema,
} from "../types/api";
import type { AppointmentChanges, AppointmentFilter, NewAppointment } from "../types/api";
import { APPOINTMENT_STATUSES } from "../types";
import type {
  Appointment,
  AppointmentDetails,
  AppointmentStatus,
  HistoryOnDelete,
  StatusCounts,
  TransitionGuard,
} from "../types";

export interface TimeSlot {
  date: string;
  startTime: string;
  endTime: string;
  /** Leave this appointment out, e.g. when moving it. */
  excludeId?: number;
}

export interface DeletedAppointment {
  appointment: Appointment;
  removedHistoryEntries: number;
}

const DETAILS_SELECT = `
  SELECT a.*, c.nome, c.cognome, c.telefono, c.email, t.nome_tipo, t.colore
  FROM appuntamenti a
  JOIN clienti c ON a.id_cliente = c.id_cliente
  LEFT JOIN tipi_appuntamento t ON a.id_tipo = t.id_tipo
`;

// --- Writes ---

export function createAppointment(db: BookingDatabase, input: NewAppointment): Appointment {
  const data = parseInput(newAppointmentSchema, input);
  assertClientExists(db, data.clientId);
  if (data.typeId !== undefined) assertTypeExists(db, data.typeId);

  try {
    const result = db.prepare(`
      INSERT INTO appuntamenti
        (id_cliente, id_tipo, data_appuntamento, ora_inizio, ora_fine, titolo,
         descrizione, luogo, note, urgente, stato, promemoria_inviato)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.clientId,
      data.typeId ?? null,
      data.date,
      data.startTime,
      data.endTime,
      data.title,
      data.description ?? null,
      data.location ?? null,
      data.notes ?? null,
      data.urgent ? 1 : 0,
      data.status,
      data.reminderSent ? 1 : 0,
    );
    return getAppointment(db, Number(result.lastInsertRowid));
  } catch (error) {
    throw translateSqliteError(error, {
      foreignKey: `Client ${data.clientId} or type ${data.typeId} does not exist`,
    });
  }
}

/**
 * Apply changes in place and refresh the modification timestamp.
 * A status change is checked against `canTransition` when one is given.
 */
export function updateAppointment(
  db: BookingDatabase,
  id: number,
  changes: AppointmentChanges,
  canTransition?: TransitionGuard,
): Appointment {
  const data = parseInput(appointmentChangesSchema, changes);
  const current = getAppointment(db, id);

  if (data.typeId !== undefined && data.typeId !== null) assertTypeExists(db, data.typeId);

  if (data.status !== undefined && data.status !== current.status && canTransition) {
    if (!canTransition(current.status, data.status)) {
      throw new StatusTransitionError(current.status, data.status);
    }
  }

  const { clauses, params } = collectAssignments([
    ["id_tipo", data.typeId],
    ["data_appuntamento", data.date],
    ["ora_inizio", data.startTime],
    ["ora_fine", data.endTime],
    ["titolo", data.title],
    ["descrizione", data.description],
    ["luogo", data.location],
    ["note", data.notes],
    ["urgente", data.urgent],
    ["stato", data.status],
    ["promemoria_inviato", data.reminderSent],
  ]);
  if (clauses.length === 0) return current;

  clauses.push("data_modifica = CURRENT_TIMESTAMP");
  try {
    db.prepare(`UPDATE appuntamenti SET ${clauses.join(", ")} WHERE id_appuntamento = ?`).run(...params, id);
  } catch (error) {
    throw translateSqliteError(error, { foreignKey: `Appointment type ${data.typeId} does not exist` });
  }
  return getAppointment(db, id);
}

/**
 * Hard delete. With "cascade" the appointment's history goes with it;
 * with "restrict" an appointment that has history is left in place.
 */
export function deleteAppointment(
  db: BookingDatabase,
  id: number,
  historyOnDelete: HistoryOnDelete,
): DeletedAppointment {
  return db.transaction((): DeletedAppointment => {
    const appointment = getAppointment(db, id);
    const entries = countHistory(db, appointment.id);

    if (entries > 0 && historyOnDelete === "restrict") {
      throw new ConstraintViolationError(
        `Appointment ${id} has ${entries} history entries and history is kept on delete`
      );
    }
    if (entries > 0) {
      db.prepare("DELETE FROM storico_modifiche WHERE id_appuntamento = ?").run(appointment.id);
    }
    db.prepare("DELETE FROM appuntamenti WHERE id_appuntamento = ?").run(appointment.id);

    return { appointment, removedHistoryEntries: entries };
  })();
}

// --- Reads ---

export function findAppointment(db: BookingDatabase, id: number): Appointment | undefined {
  const row = db
    .prepare<[number], RawAppointmentRow>("SELECT * FROM appuntamenti WHERE id_appuntamento = ?")
    .get(id);
  return row ? toAppointment(row) : undefined;
}

export function getAppointment(db: BookingDatabase, id: number): Appointment {
  const appointment = findAppointment(db, parseInput(idSchema, id));
  if (!appointment) throw new NotFoundError("Appointment", id);
  return appointment;
}

export function getAppointmentDetails(db: BookingDatabase, id: number): AppointmentDetails {
  const row = db
    .prepare<[number], RawDetailsRow>(`${DETAILS_SELECT} WHERE a.id_appuntamento = ?`)
    .get(parseInput(idSchema, id));
  if (!row) throw new NotFoundError("Appointment", id);
  return toDetails(row);
}

export function listAppointments(db: BookingDatabase, filter: AppointmentFilter = {}): AppointmentDetails[] {
  const data = parseInput(appointmentFilterSchema, filter);
  let sql = `${DETAILS_SELECT} WHERE 1=1`;
  const params: SqlValue[] = [];

  if (data.from) {
    sql += " AND a.data_appuntamento >= ?";
    params.push(data.from);
  }
  if (data.to) {
    sql += " AND a.data_appuntamento <= ?";
    params.push(data.to);
  }
  if (data.status) {
    sql += " AND a.stato = ?";
    params.push(data.status);
  }
  if (data.urgent !== undefined) {
    sql += " AND a.urgente = ?";
    params.push(data.urgent ? 1 : 0);
  }
  if (data.clientId !== undefined) {
    sql += " AND a.id_cliente = ?";
    params.push(data.clientId);
  }
  sql += " ORDER BY a.data_appuntamento, a.ora_inizio";
  if (data.limit !== undefined) {
    sql += " LIMIT ?";
    params.push(data.limit);
  }

  return db.prepare<SqlValue[], RawDetailsRow>(sql).all(...params).map(toDetails);
}

/** The appointments of one day, earliest first. */
export function listAppointmentsOn(
  db: BookingDatabase,
  date: string,
  options: { includeCancelled?: boolean } = {},
): AppointmentDetails[] {
  const day = parseInput(isoDateSchema, date);
  const cancelled = options.includeCancelled ? "" : " AND a.stato != 'cancellato'";
  return db
    .prepare<[string], RawDetailsRow>(
      `${DETAILS_SELECT} WHERE a.data_appuntamento = ?${cancelled} ORDER BY a.ora_inizio`
    )
    .all(day)
    .map(toDetails);
}

/** Keyword search over title, description, notes and the client's name. Newest first. */
export function searchAppointments(db: BookingDatabase, query: string): AppointmentDetails[] {
  const pattern = likePattern(query.trim());
  return db
    .prepare<SqlValue[], RawDetailsRow>(`
      ${DETAILS_SELECT}
      WHERE a.titolo LIKE ? ESCAPE '\\'
         OR a.descrizione LIKE ? ESCAPE '\\'
         OR a.note LIKE ? ESCAPE '\\'
         OR c.nome LIKE ? ESCAPE '\\'
         OR c.cognome LIKE ? ESCAPE '\\'
      ORDER BY a.data_appuntamento DESC, a.ora_inizio DESC
    `)
    .all(pattern, pattern, pattern, pattern, pattern)
    .map(toDetails);
}

/**
 * Appointments on the same date whose [start, end) overlaps the slot.
 * Cancelled and no-show appointments do not occupy their slot.
 * This is a query only; nothing stops an insert that overlaps.
 */
export function findConflicts(db: BookingDatabase, slot: TimeSlot): Appointment[] {
  let sql = `
    SELECT * FROM appuntamenti
    WHERE data_appuntamento = ?
      AND stato NOT IN ('cancellato', 'non_presentato')
      AND ora_inizio < ?
      AND ora_fine > ?
  `;
  const params: SqlValue[] = [slot.date, slot.endTime, slot.startTime];
  if (slot.excludeId !== undefined) {
    sql += " AND id_appuntamento != ?";
    params.push(slot.excludeId);
  }
  sql += " ORDER BY ora_inizio";

  return db.prepare<SqlValue[], RawAppointmentRow>(sql).all(...params).map(toAppointment);
}

/** Open appointments (not completed, not cancelled) from a date onwards. */
export function listUpcomingAppointments(
  db: BookingDatabase,
  options: { from: string; clientId?: number; limit: number; urgentFirst?: boolean },
): AppointmentDetails[] {
  let sql = `${DETAILS_SELECT}
    WHERE a.data_appuntamento >= ?
      AND a.stato NOT IN ('completato', 'cancellato')`;
  const params: SqlValue[] = [options.from];
  if (options.clientId !== undefined) {
    sql += " AND a.id_cliente = ?";
    params.push(options.clientId);
  }
  sql += options.urgentFirst
    ? " ORDER BY a.urgente DESC, a.data_appuntamento, a.ora_inizio"
    : " ORDER BY a.data_appuntamento, a.ora_inizio";
  sql += " LIMIT ?";
  params.push(options.limit);

  return db.prepare<SqlValue[], RawDetailsRow>(sql).all(...params).map(toDetails);
}

export function countAppointmentsByStatus(
  db: BookingDatabase,
  filter: { clientId?: number } = {},
): StatusCounts {
  const counts: StatusCounts = {
    confermato: 0,
    completato: 0,
    cancellato: 0,
    in_attesa: 0,
    non_presentato: 0,
  };
  const where = filter.clientId !== undefined ? " WHERE id_cliente = ?" : "";
  const params: SqlValue[] = filter.clientId !== undefined ? [filter.clientId] : [];

  const rows = db
    .prepare<SqlValue[], { stato: string; total: number }>(
      `SELECT stato, COUNT(*) AS total FROM appuntamenti${where} GROUP BY stato`
    )
    .all(...params);
  for (const row of rows) {
    counts[toStatus(row.stato)] = row.total;
  }
  return counts;
}

// --- Internal helpers ---

function assertClientExists(db: BookingDatabase, clientId: number): void {
  if (!findClient(db, clientId)) {
    throw new ReferenceViolationError(`Client ${clientId} does not exist`);
  }
}

function assertTypeExists(db: BookingDatabase, typeId: number): void {
  if (!findAppointmentType(db, typeId)) {
    throw new ReferenceViolationError(`Appointment type ${typeId} does not exist`);
  }
}

interface RawAppointmentRow {
  id_appuntamento: number;
  id_cliente: number;
  id_tipo: number | null;
  data_appuntamento: string;
  ora_inizio: string;
  ora_fine: string;
  titolo: string;
  descrizione: string | null;
  luogo: string | null;
  note: string | null;
  urgente: number;
  stato: string;
  promemoria_inviato: number;
  data_creazione: string;
  data_modifica: string;
}

interface RawDetailsRow extends RawAppointmentRow {
  nome: string;
  cognome: string;
  telefono: string;
  email: string | null;
  nome_tipo: string | null;
  colore: string | null;
}

function toStatus(value: string): AppointmentStatus {
  const status = APPOINTMENT_STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unknown appointment status in store: ${value}`);
  }
  return status;
}

function toAppointment(row: RawAppointmentRow): Appointment {
  return {
    id: row.id_appuntamento,
    clientId: row.id_cliente,
    typeId: row.id_tipo,
    date: row.data_appuntamento,
    startTime: row.ora_inizio,
    endTime: row.ora_fine,
    title: row.titolo,
    description: row.descrizione,
    location: row.luogo,
    notes: row.note,
    urgent: row.urgente === 1,
    status: toStatus(row.stato),
    reminderSent: row.promemoria_inviato === 1,
    createdAt: row.data_creazione,
    updatedAt: row.data_modifica,
  };
}

function toDetails(row: RawDetailsRow): AppointmentDetails {
  return {
    ...toAppointment(row),
    client: {
      firstName: row.nome,
      lastName: row.cognome,
      phone: row.telefono,
      email: row.email,
    },
    typeName: row.nome_tipo,
    typeColor: row.colore,
  };
}
