import { z } from "zod";
import type { BookingDatabase } from "./db";
import { ReferenceViolationError, parseInput, translateSqliteError } from "./errors";
import { idSchema } from "../types/api";
import type { ChangeHistoryEntry } from "../types";

const entrySchema = z.object({
  appointmentId: idSchema,
  changeType: z.string().trim().min(1, "Change type is required"),
  description: z.string().optional(),
});

/**
 * Append an audit entry for an appointment. Entries are never edited;
 * they only disappear when the ledger deletes their appointment under
 * the "cascade" policy.
 */
export function appendHistory(
  db: BookingDatabase,
  appointmentId: number,
  changeType: string,
  description?: string,
): ChangeHistoryEntry {
  const data = parseInput(entrySchema, { appointmentId, changeType, description });

  const exists = db
    .prepare<[number], { id: number }>("SELECT id_appuntamento AS id FROM appuntamenti WHERE id_appuntamento = ?")
    .get(data.appointmentId);
  if (!exists) {
    throw new ReferenceViolationError(`Appointment ${data.appointmentId} does not exist`);
  }

  try {
    const result = db.prepare(`
      INSERT INTO storico_modifiche (id_appuntamento, tipo_modifica, descrizione_modifica)
      VALUES (?, ?, ?)
    `).run(data.appointmentId, data.changeType, data.description ?? null);

    const row = db
      .prepare<[number], RawHistoryRow>("SELECT * FROM storico_modifiche WHERE id_modifica = ?")
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`History entry for appointment ${data.appointmentId} was not written`);
    }
    return toHistoryEntry(row);
  } catch (error) {
    throw translateSqliteError(error, { foreignKey: `Appointment ${data.appointmentId} does not exist` });
  }
}

/** Newest first, for audit display. */
export function listHistory(db: BookingDatabase, appointmentId: number): ChangeHistoryEntry[] {
  return db
    .prepare<[number], RawHistoryRow>(`
      SELECT * FROM storico_modifiche
      WHERE id_appuntamento = ?
      ORDER BY data_modifica DESC, id_modifica DESC
    `)
    .all(appointmentId)
    .map(toHistoryEntry);
}

export function countHistory(db: BookingDatabase, appointmentId: number): number {
  const row = db
    .prepare<[number], { total: number }>("SELECT COUNT(*) AS total FROM storico_modifiche WHERE id_appuntamento = ?")
    .get(appointmentId);
  return row?.total ?? 0;
}

interface RawHistoryRow {
  id_modifica: number;
  id_appuntamento: number;
  tipo_modifica: string;
  descrizione_modifica: string | null;
  data_modifica: string;
}

function toHistoryEntry(row: RawHistoryRow): ChangeHistoryEntry {
  return {
    id: row.id_modifica,
    appointmentId: row.id_appuntamento,
    changeType: row.tipo_modifica,
    description: row.descrizione_modifica,
    changedAt: row.data_modifica,
  };
}
