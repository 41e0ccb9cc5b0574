import Database from "better-sqlite3";
import path from "path";
import { createChildLogger } from "../logger";

const log = createChildLogger("store");

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS clienti (
  id_cliente INTEGER PRIMARY KEY AUTOINCREMENT,
  nome TEXT NOT NULL,
  cognome TEXT NOT NULL,
  email TEXT UNIQUE,
  telefono TEXT NOT NULL,
  telefono_secondario TEXT,
  via TEXT,
  numero_civico TEXT,
  citta TEXT,
  cap TEXT,
  provincia TEXT,
  note TEXT,
  data_registrazione TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  attivo BOOLEAN DEFAULT 1
);

CREATE TABLE IF NOT EXISTS tipi_appuntamento (
  id_tipo INTEGER PRIMARY KEY AUTOINCREMENT,
  nome_tipo TEXT NOT NULL UNIQUE,
  descrizione TEXT,
  durata_minuti INTEGER DEFAULT 30,
  colore TEXT
);

CREATE TABLE IF NOT EXISTS appuntamenti (
  id_appuntamento INTEGER PRIMARY KEY AUTOINCREMENT,
  id_cliente INTEGER NOT NULL,
  id_tipo INTEGER,
  data_appuntamento DATE NOT NULL,
  ora_inizio TIME NOT NULL,
  ora_fine TIME NOT NULL,
  titolo TEXT NOT NULL,
  descrizione TEXT,
  luogo TEXT,
  note TEXT,
  urgente BOOLEAN DEFAULT 0,
  stato TEXT DEFAULT 'confermato',
  promemoria_inviato BOOLEAN DEFAULT 0,
  data_creazione TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  data_modifica TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (id_cliente) REFERENCES clienti(id_cliente),
  FOREIGN KEY (id_tipo) REFERENCES tipi_appuntamento(id_tipo),
  CHECK (stato IN ('confermato', 'completato', 'cancellato', 'in_attesa', 'non_presentato'))
);

CREATE TABLE IF NOT EXISTS storico_modifiche (
  id_modifica INTEGER PRIMARY KEY AUTOINCREMENT,
  id_appuntamento INTEGER NOT NULL,
  tipo_modifica TEXT NOT NULL,
  descrizione_modifica TEXT,
  data_modifica TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (id_appuntamento) REFERENCES appuntamenti(id_appuntamento)
);

CREATE INDEX IF NOT EXISTS idx_clienti_email ON clienti(email);
CREATE INDEX IF NOT EXISTS idx_appuntamenti_data ON appuntamenti(data_appuntamento);
CREATE INDEX IF NOT EXISTS idx_appuntamenti_cliente ON appuntamenti(id_cliente);
`;

export type BookingDatabase = Database.Database;

/**
 * Open (creating if absent) the booking store and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): BookingDatabase {
  const inMemory = filename === ":memory:";
  const dbPath = inMemory ? filename : path.resolve(filename);

  const db = new Database(dbPath);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);

  log.debug("Booking store opened", { path: dbPath });
  return db;
}

export function closeDatabase(db: BookingDatabase): void {
  if (db.open) {
    db.close();
  }
}
