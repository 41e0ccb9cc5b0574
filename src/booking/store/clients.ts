import type { BookingDatabase } from "./db";
import { NotFoundError, ReferenceViolationError, parseInput, translateSqliteError } from "./errors";
import { collectAssignments, likePattern, type SqlValue } from "./sql";
import { clientChangesSchema, idSchema, newClientSchema } from "../types/api";
import type { ClientChanges, NewClient } from "../types/api";
import type { Client } from "../types";

export interface ClientFilter {
  active?: boolean;
  /** Matched against first name, last name and email. */
  query?: string;
  city?: string;
}

// --- Writes ---

export function createClient(db: BookingDatabase, input: NewClient): Client {
  const data = parseInput(newClientSchema, input);

  try {
    const result = db.prepare(`
      INSERT INTO clienti (nome, cognome, email, telefono, telefono_secondario,
                           via, numero_civico, citta, cap, provincia, note)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.firstName,
      data.lastName,
      data.email ?? null,
      data.phone,
      data.secondaryPhone ?? null,
      data.street ?? null,
      data.streetNumber ?? null,
      data.city ?? null,
      data.postalCode ?? null,
      data.province ?? null,
      data.notes ?? null,
    );
    return getClient(db, Number(result.lastInsertRowid));
  } catch (error) {
    throw translateSqliteError(error, { unique: `Email already registered: ${data.email}` });
  }
}

export function updateClient(db: BookingDatabase, id: number, changes: ClientChanges): Client {
  const data = parseInput(clientChangesSchema, changes);
  getClient(db, id);

  const { clauses, params } = collectAssignments([
    ["nome", data.firstName],
    ["cognome", data.lastName],
    ["email", data.email],
    ["telefono", data.phone],
    ["telefono_secondario", data.secondaryPhone],
    ["via", data.street],
    ["numero_civico", data.streetNumber],
    ["citta", data.city],
    ["cap", data.postalCode],
    ["provincia", data.province],
    ["note", data.notes],
    ["attivo", data.active],
  ]);

  if (clauses.length > 0) {
    try {
      db.prepare(`UPDATE clienti SET ${clauses.join(", ")} WHERE id_cliente = ?`).run(...params, id);
    } catch (error) {
      throw translateSqliteError(error, { unique: `Email already registered: ${data.email}` });
    }
  }
  return getClient(db, id);
}

/** Clients are retired, not removed: this only clears the active flag. */
export function deactivateClient(db: BookingDatabase, id: number): Client {
  return updateClient(db, id, { active: false });
}

/**
 * Hard delete. Refused while appointments still reference the client,
 * so the ledger never holds a dangling client id.
 */
export function deleteClient(db: BookingDatabase, id: number): Client {
  const client = getClient(db, id);
  const row = db
    .prepare<[number], { total: number }>("SELECT COUNT(*) AS total FROM appuntamenti WHERE id_cliente = ?")
    .get(id);
  const total = row?.total ?? 0;
  if (total > 0) {
    throw new ReferenceViolationError(
      `Client ${id} still has ${total} appointment(s); deactivate the client instead`
    );
  }

  try {
    db.prepare("DELETE FROM clienti WHERE id_cliente = ?").run(id);
  } catch (error) {
    throw translateSqliteError(error, { foreignKey: `Client ${id} is still referenced` });
  }
  return client;
}

// --- Reads ---

export function findClient(db: BookingDatabase, id: number): Client | undefined {
  const row = db
    .prepare<[number], RawClientRow>("SELECT * FROM clienti WHERE id_cliente = ?")
    .get(id);
  return row ? toClient(row) : undefined;
}

export function getClient(db: BookingDatabase, id: number): Client {
  const client = findClient(db, parseInput(idSchema, id));
  if (!client) throw new NotFoundError("Client", id);
  return client;
}

export function findClientByEmail(db: BookingDatabase, email: string): Client | undefined {
  const row = db
    .prepare<[string], RawClientRow>("SELECT * FROM clienti WHERE email = ?")
    .get(email.trim());
  return row ? toClient(row) : undefined;
}

export function listClients(db: BookingDatabase, filter: ClientFilter = {}): Client[] {
  let sql = "SELECT * FROM clienti WHERE 1=1";
  const params: SqlValue[] = [];

  if (filter.active !== undefined) {
    sql += " AND attivo = ?";
    params.push(filter.active ? 1 : 0);
  }
  if (filter.query) {
    const pattern = likePattern(filter.query);
    sql += " AND (nome LIKE ? ESCAPE '\\' OR cognome LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\')";
    params.push(pattern, pattern, pattern);
  }
  if (filter.city) {
    sql += " AND citta LIKE ? ESCAPE '\\'";
    params.push(likePattern(filter.city));
  }
  sql += " ORDER BY cognome, nome";

  return db.prepare<SqlValue[], RawClientRow>(sql).all(...params).map(toClient);
}

// --- Internal helpers ---

interface RawClientRow {
  id_cliente: number;
  nome: string;
  cognome: string;
  email: string | null;
  telefono: string;
  telefono_secondario: string | null;
  via: string | null;
  numero_civico: string | null;
  citta: string | null;
  cap: string | null;
  provincia: string | null;
  note: string | null;
  data_registrazione: string;
  attivo: number;
}

function toClient(row: RawClientRow): Client {
  return {
    id: row.id_cliente,
    firstName: row.nome,
    lastName: row.cognome,
    email: row.email,
    phone: row.telefono,
    secondaryPhone: row.telefono_secondario,
    street: row.via,
    streetNumber: row.numero_civico,
    city: row.citta,
    postalCode: row.cap,
    province: row.provincia,
    notes: row.note,
    registeredAt: row.data_registrazione,
    active: row.attivo === 1,
  };
}
