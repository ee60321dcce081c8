/**
 * Persistencia del registro de mirrors (SQLite WAL, archivo mirrors.db).
 *
 * Tablas: mirrors (lista ordenada por position con salud y contadores) y
 * availability (presencia confirmada por par mirror/identificador). Los mirrors nunca
 * se borran: saveMirrors hace upsert por nombre dentro de una transacción.
 *
 * @module MirrorStore
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { REGISTRY_ERRORS } from '../constants/errors';
import type { AvailabilityRecord, MirrorSite } from './types';

const log = logger.child('MirrorStore');

const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS mirrors (
    name TEXT PRIMARY KEY,
    base_url TEXT NOT NULL UNIQUE,
    country TEXT,
    priority INTEGER NOT NULL DEFAULT 1,
    is_active INTEGER NOT NULL DEFAULT 1,
    health_score REAL NOT NULL DEFAULT 1.0,
    failure_count INTEGER NOT NULL DEFAULT 0,
    last_checked INTEGER,
    last_error TEXT,
    unavailable_until INTEGER,
    position INTEGER NOT NULL,
    CHECK(health_score >= 0 AND health_score <= 1),
    CHECK(is_active IN (0, 1))
);
CREATE TABLE IF NOT EXISTS availability (
    mirror_name TEXT NOT NULL,
    identifier TEXT NOT NULL,
    state TEXT NOT NULL,
    verified_at INTEGER NOT NULL,
    PRIMARY KEY (mirror_name, identifier),
    FOREIGN KEY (mirror_name) REFERENCES mirrors(name) ON DELETE CASCADE,
    CHECK(state IN ('present', 'absent'))
);
CREATE INDEX IF NOT EXISTS idx_mirrors_position ON mirrors(position);
CREATE INDEX IF NOT EXISTS idx_availability_identifier ON availability(identifier);
`;

interface MirrorRow {
  name: string;
  base_url: string;
  country: string | null;
  priority: number;
  is_active: number;
  health_score: number;
  failure_count: number;
  last_checked: number | null;
  last_error: string | null;
  unavailable_until: number | null;
  position: number;
}

interface AvailabilityRow {
  mirror_name: string;
  identifier: string;
  state: string;
  verified_at: number;
}

interface MirrorStoreStatements {
  upsertMirror: Database.Statement<[MirrorRow]>;
  getMirrors: Database.Statement<[], MirrorRow>;
  upsertAvailability: Database.Statement<[AvailabilityRow]>;
  deleteAvailability: Database.Statement<[string, string]>;
  getAvailability: Database.Statement<[], AvailabilityRow>;
}

function rowToMirror(row: MirrorRow): MirrorSite {
  return {
    name: row.name,
    baseUrl: row.base_url,
    country: row.country,
    priority: row.priority,
    isActive: row.is_active === 1,
    healthScore: row.health_score,
    failureCount: row.failure_count,
    lastChecked: row.last_checked,
    lastError: row.last_error,
    unavailableUntil: row.unavailable_until,
  };
}

function mirrorToRow(mirror: MirrorSite, position: number): MirrorRow {
  return {
    name: mirror.name,
    base_url: mirror.baseUrl,
    country: mirror.country,
    priority: mirror.priority,
    is_active: mirror.isActive ? 1 : 0,
    health_score: mirror.healthScore,
    failure_count: mirror.failureCount,
    last_checked: mirror.lastChecked,
    last_error: mirror.lastError,
    unavailable_until: mirror.unavailableUntil,
    position,
  };
}

function rowToAvailability(row: AvailabilityRow): AvailabilityRecord | null {
  if (row.state !== 'present' && row.state !== 'absent') return null;
  return {
    mirror: row.mirror_name,
    identifier: row.identifier,
    state: row.state,
    verifiedAt: row.verified_at,
  };
}

/**
 * Fuente durable del registro: la salud aprendida sobrevive a reinicios.
 */
export class MirrorStore {
  private _db: Database.Database | null = null;
  private statements: MirrorStoreStatements | null = null;
  private readonly dbPath: string;

  /** @param dbPath - Ruta del archivo SQLite o ':memory:'. */
  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  get isInitialized(): boolean {
    return this._db !== null;
  }

  /**
   * Crea el directorio si no existe, abre la DB con WAL, ejecuta el schema y prepara statements.
   *
   * @returns true si la inicialización fue correcta.
   */
  initialize(): boolean {
    if (this._db) {
      log.warn('MirrorStore ya está inicializado');
      return true;
    }

    try {
      if (this.dbPath !== ':memory:') {
        const dbDir = path.dirname(this.dbPath);
        if (!fs.existsSync(dbDir)) {
          fs.mkdirSync(dbDir, { recursive: true });
        }
      }

      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.exec(CREATE_SCHEMA_SQL);
      this._db = db;
      this._prepareStatements(db);
      log.info(`MirrorStore inicializado (${this.dbPath})`);
      return true;
    } catch (error) {
      log.error('Error inicializando MirrorStore:', error);
      this._db?.close();
      this._db = null;
      return false;
    }
  }

  private _prepareStatements(db: Database.Database): void {
    this.statements = {
      upsertMirror: db.prepare<[MirrorRow]>(`
        INSERT INTO mirrors (name, base_url, country, priority, is_active, health_score,
                             failure_count, last_checked, last_error, unavailable_until, position)
        VALUES (@name, @base_url, @country, @priority, @is_active, @health_score,
                @failure_count, @last_checked, @last_error, @unavailable_until, @position)
        ON CONFLICT(name) DO UPDATE SET
          base_url = excluded.base_url,
          country = excluded.country,
          priority = excluded.priority,
          is_active = excluded.is_active,
          health_score = excluded.health_score,
          failure_count = excluded.failure_count,
          last_checked = excluded.last_checked,
          last_error = excluded.last_error,
          unavailable_until = excluded.unavailable_until,
          position = excluded.position
      `),
      getMirrors: db.prepare<[], MirrorRow>('SELECT * FROM mirrors ORDER BY position ASC'),
      upsertAvailability: db.prepare<[AvailabilityRow]>(`
        INSERT INTO availability (mirror_name, identifier, state, verified_at)
        VALUES (@mirror_name, @identifier, @state, @verified_at)
        ON CONFLICT(mirror_name, identifier) DO UPDATE SET
          state = excluded.state,
          verified_at = excluded.verified_at
      `),
      deleteAvailability: db.prepare<[string, string]>(
        'DELETE FROM availability WHERE mirror_name = ? AND identifier = ?'
      ),
      getAvailability: db.prepare<[], AvailabilityRow>(
        'SELECT mirror_name, identifier, state, verified_at FROM availability'
      ),
    };
  }

  private requireStatements(): MirrorStoreStatements {
    if (!this.statements) {
      throw new Error(REGISTRY_ERRORS.STORE_NOT_INITIALIZED);
    }
    return this.statements;
  }

  loadMirrors(): MirrorSite[] {
    return this.requireStatements().getMirrors.all().map(rowToMirror);
  }

  /** Upsert de la lista completa en una transacción; el índice define position. */
  saveMirrors(mirrors: readonly MirrorSite[]): void {
    const statements = this.requireStatements();
    const db = this._db;
    if (!db) throw new Error(REGISTRY_ERRORS.STORE_NOT_INITIALIZED);
    const transaction = db.transaction((list: readonly MirrorSite[]) => {
      list.forEach((mirror, index) => {
        statements.upsertMirror.run(mirrorToRow(mirror, index));
      });
    });
    transaction(mirrors);
  }

  saveMirror(mirror: MirrorSite, position: number): void {
    this.requireStatements().upsertMirror.run(mirrorToRow(mirror, position));
  }

  loadAvailability(): AvailabilityRecord[] {
    const records: AvailabilityRecord[] = [];
    for (const row of this.requireStatements().getAvailability.all()) {
      const record = rowToAvailability(row);
      if (record) records.push(record);
    }
    return records;
  }

  saveAvailability(record: AvailabilityRecord): void {
    this.requireStatements().upsertAvailability.run({
      mirror_name: record.mirror,
      identifier: record.identifier,
      state: record.state,
      verified_at: record.verifiedAt,
    });
  }

  deleteAvailability(mirror: string, identifier: string): void {
    this.requireStatements().deleteAvailability.run(mirror, identifier);
  }

  close(): void {
    if (this._db) {
      if (this.dbPath !== ':memory:') {
        this._db.pragma('wal_checkpoint(TRUNCATE)');
      }
      this._db.close();
      this._db = null;
      this.statements = null;
      log.info('MirrorStore cerrado');
    }
  }
}
