import type { BookingDatabase } from "./db";
import { NotFoundError, ReferenceViolationError, parseInput, translateSqliteError } from "./errors";
import { collectAssignments } from "./sql";
import { appointmentTypeChangesSchema, idSchema, newAppointmentTypeSchema } from "../types/api";
import type { AppointmentTypeChanges, NewAppointmentType } from "../types/api";
import type { AppointmentType } from "../types";

export function createAppointmentType(db: BookingDatabase, input: NewAppointmentType): AppointmentType {
  const data = parseInput(newAppointmentTypeSchema, input);

  try {
    const result = db.prepare(`
      INSERT INTO tipi_appuntamento (nome_tipo, descrizione, durata_minuti, colore)
      VALUES (?, ?, ?, ?)
    `).run(data.name, data.description ?? null, data.durationMinutes, data.color ?? null);
    return getAppointmentType(db, Number(result.lastInsertRowid));
  } catch (error) {
    throw translateSqliteError(error, { unique: `Appointment type already exists: ${data.name}` });
  }
}

export function updateAppointmentType(
  db: BookingDatabase,
  id: number,
  changes: AppointmentTypeChanges,
): AppointmentType {
  const data = parseInput(appointmentTypeChangesSchema, changes);
  getAppointmentType(db, id);

  const { clauses, params } = collectAssignments([
    ["nome_tipo", data.name],
    ["descrizione", data.description],
    ["durata_minuti", data.durationMinutes],
    ["colore", data.color],
  ]);

  if (clauses.length > 0) {
    try {
      db.prepare(`UPDATE tipi_appuntamento SET ${clauses.join(", ")} WHERE id_tipo = ?`).run(...params, id);
    } catch (error) {
      throw translateSqliteError(error, { unique: `Appointment type already exists: ${data.name}` });
    }
  }
  return getAppointmentType(db, id);
}

export function deleteAppointmentType(db: BookingDatabase, id: number): AppointmentType {
  const type = getAppointmentType(db, id);
  const row = db
    .prepare<[number], { total: number }>("SELECT COUNT(*) AS total FROM appuntamenti WHERE id_tipo = ?")
    .get(id);
  if ((row?.total ?? 0) > 0) {
    throw new ReferenceViolationError(`Appointment type "${type.name}" is still used by appointments`);
  }

  db.prepare("DELETE FROM tipi_appuntamento WHERE id_tipo = ?").run(id);
  return type;
}

export function findAppointmentType(db: BookingDatabase, id: number): AppointmentType | undefined {
  const row = db
    .prepare<[number], RawTypeRow>("SELECT * FROM tipi_appuntamento WHERE id_tipo = ?")
    .get(id);
  return row ? toAppointmentType(row) : undefined;
}

export function getAppointmentType(db: BookingDatabase, id: number): AppointmentType {
  const type = findAppointmentType(db, parseInput(idSchema, id));
  if (!type) throw new NotFoundError("Appointment type", id);
  return type;
}

export function findAppointmentTypeByName(db: BookingDatabase, name: string): AppointmentType | undefined {
  const row = db
    .prepare<[string], RawTypeRow>("SELECT * FROM tipi_appuntamento WHERE nome_tipo = ?")
    .get(name.trim());
  return row ? toAppointmentType(row) : undefined;
}

export function listAppointmentTypes(db: BookingDatabase): AppointmentType[] {
  return db
    .prepare<[], RawTypeRow>("SELECT * FROM tipi_appuntamento ORDER BY nome_tipo")
    .all()
    .map(toAppointmentType);
}

interface RawTypeRow {
  id_tipo: number;
  nome_tipo: string;
  descrizione: string | null;
  durata_minuti: number;
  colore: string | null;
}

function toAppointmentType(row: RawTypeRow): AppointmentType {
  return {
    id: row.id_tipo,
    name: row.nome_tipo,
    description: row.descrizione,
    durationMinutes: row.durata_minuti,
    color: row.colore,
  };
}
