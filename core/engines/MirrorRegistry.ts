/**
 * Registro de mirrors: salud, contadores de fallo y disponibilidad por identificador.
 *
 * Es el único estado mutable compartido entre tareas. Todas las mutaciones son métodos
 * síncronos: no hay ningún await entre leer y escribir un campo, de modo que las tareas
 * concurrentes del event loop quedan serializadas. Los métodos de lectura devuelven copias.
 *
 * @module MirrorRegistry
 */

import config from '../config';
import type { AppConfig, FailureSeverity } from '../config';
import { logger } from '../utils/logger';
import { normalizeBaseUrl } from '../utils/validation';
import { readJSONFile, writeJSONFile } from '../utils/fileHelpers';
import { validateMirrorList, validateMirrorSeed } from '../utils/schemas';
import type { MirrorSeed, MirrorSeedInput } from '../utils/schemas';
import type { Clock } from '../utils/usageWindow';
import { REGISTRY_ERRORS } from '../constants/errors';
import { Availability } from './types';
import type { AvailabilityRecord, AvailabilityState, MirrorSite } from './types';
import type { MirrorStore } from './MirrorStore';
import type { EventBus } from './EventBus';

const log = logger.child('MirrorRegistry');

export type MirrorSettings = AppConfig['mirrors'];

export interface MirrorRegistryOptions {
  /** Sin store el registro vive solo en memoria. */
  store?: MirrorStore | null;
  settings?: MirrorSettings;
  events?: EventBus | null;
  now?: Clock;
}

export interface RefreshResult {
  added: number;
  updated: number;
}

function roundScore(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function clampScore(value: number): number {
  return Math.min(1, Math.max(0, roundScore(value)));
}

export class UnknownMirrorError extends Error {
  constructor(name: string) {
    super(`${REGISTRY_ERRORS.UNKNOWN_MIRROR}: ${name}`);
    this.name = 'UnknownMirrorError';
  }
}

export class MirrorRegistry {
  private readonly mirrors: MirrorSite[] = [];
  /** identifier → (mirror → registro) */
  private readonly availability = new Map<string, Map<string, AvailabilityRecord>>();
  private readonly store: MirrorStore | null;
  private readonly settings: MirrorSettings;
  private readonly events: EventBus | null;
  private readonly now: Clock;

  constructor(options: MirrorRegistryOptions = {}) {
    this.store = options.store ?? null;
    this.settings = options.settings ?? config.mirrors;
    this.events = options.events ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.mirrors.length;
  }

  private get writeThrough(): boolean {
    return this.store !== null && this.store.isInitialized && this.settings.autoPersist;
  }

  // ---------------------------------------------------------------------------
  // Carga, alta y persistencia
  // ---------------------------------------------------------------------------

  /**
   * Carga mirrors y disponibilidad desde el store, reemplazando el estado en memoria.
   * @returns Número de mirrors cargados.
   */
  load(): number {
    if (!this.store) return 0;
    const mirrors = this.store.loadMirrors();
    this.mirrors.splice(0, this.mirrors.length, ...mirrors);
    this.availability.clear();
    for (const record of this.store.loadAvailability()) {
      this.setAvailabilityRecord(record);
    }
    log.info(`Registro cargado: ${mirrors.length} mirrors`);
    return mirrors.length;
  }

  /** Escribe la lista completa (con salud y contadores) en el store. */
  persist(): void {
    if (!this.store) return;
    this.store.saveMirrors(this.mirrors);
    for (const byMirror of this.availability.values()) {
      for (const record of byMirror.values()) {
        this.store.saveAvailability(record);
      }
    }
    log.debug(`Registro persistido: ${this.mirrors.length} mirrors`);
  }

  /**
   * Alta o actualización de un mirror. Si ya existe (por nombre o URL base) se actualizan
   * país y prioridad conservando la salud aprendida.
   */
  upsertMirror(seedInput: MirrorSeedInput): MirrorSite {
    const validation = validateMirrorSeed(seedInput);
    if (!validation.success || !validation.data) {
      throw new Error(`${REGISTRY_ERRORS.SEED_INVALID}: ${validation.error ?? ''}`);
    }
    return this.applySeed(validation.data).mirror;
  }

  private applySeed(seed: MirrorSeed): { mirror: MirrorSite; created: boolean } {
    const baseUrl = normalizeBaseUrl(seed.baseUrl);
    const byName = this.mirrors.findIndex(m => m.name === seed.name);
    const byUrl = this.mirrors.findIndex(m => m.baseUrl === baseUrl);
    const index = byName >= 0 ? byName : byUrl;

    if (index >= 0) {
      const existing = this.mirrors[index];
      if (existing.name !== seed.name) {
        log.warn(`${REGISTRY_ERRORS.DUPLICATE_MIRROR}: ${baseUrl} se mantiene como "${existing.name}"`);
      } else if (byUrl >= 0 && byUrl !== index) {
        log.warn(
          `${REGISTRY_ERRORS.DUPLICATE_MIRROR}: ${baseUrl} pertenece a "${this.mirrors[byUrl].name}", ` +
            `"${existing.name}" conserva ${existing.baseUrl}`
        );
      } else {
        existing.baseUrl = baseUrl;
      }
      existing.country = seed.country ?? existing.country;
      existing.priority = seed.priority;
      this.saveMirror(existing);
      return { mirror: { ...existing }, created: false };
    }

    const mirror: MirrorSite = {
      name: seed.name,
      baseUrl,
      country: seed.country ?? null,
      priority: seed.priority,
      isActive: seed.isActive,
      healthScore: clampScore(seed.healthScore ?? 1),
      failureCount: 0,
      lastChecked: null,
      lastError: null,
      unavailableUntil: null,
    };
    this.mirrors.push(mirror);
    this.saveMirror(mirror);
    log.info(`Mirror añadido: ${mirror.name} (${mirror.baseUrl})`);
    return { mirror: { ...mirror }, created: true };
  }

  /** Aplica una lista semilla completa (archivo de mirrors o refresco remoto). */
  refresh(seeds: readonly MirrorSeedInput[]): RefreshResult {
    const result: RefreshResult = { added: 0, updated: 0 };
    for (const seedInput of seeds) {
      const validation = validateMirrorSeed(seedInput);
      if (!validation.success || !validation.data) {
        log.warn(`Mirror ignorado en refresco: ${validation.error ?? ''}`);
        continue;
      }
      const { created } = this.applySeed(validation.data);
      if (created) result.added++;
      else result.updated++;
    }
    log.info(`Refresco de mirrors: ${result.added} nuevos, ${result.updated} actualizados`);
    return result;
  }

  /** Lee y valida un archivo { mirrors: [...] } y lo aplica con refresh. */
  async importFromFile(filePath: string): Promise<RefreshResult> {
    const raw = await readJSONFile(filePath);
    if (raw === null) {
      throw new Error(`${REGISTRY_ERRORS.SEED_INVALID}: ${filePath} no existe`);
    }
    const validation = validateMirrorList(raw);
    if (!validation.success || !validation.data) {
      throw new Error(`${REGISTRY_ERRORS.SEED_INVALID} (${filePath}): ${validation.error ?? ''}`);
    }
    return this.refresh(validation.data.mirrors);
  }

  /** Exporta la lista con su estado de salud en el mismo formato que importFromFile. */
  async exportToFile(filePath: string): Promise<void> {
    await writeJSONFile(filePath, {
      version: 1,
      mirrors: this.mirrors.map(m => ({
        name: m.name,
        baseUrl: m.baseUrl,
        country: m.country,
        priority: m.priority,
        isActive: m.isActive,
        healthScore: m.healthScore,
      })),
    });
  }

  // ---------------------------------------------------------------------------
  // Consultas
  // ---------------------------------------------------------------------------

  listMirrors(): MirrorSite[] {
    this.expireCooldowns();
    return this.mirrors.map(m => ({ ...m }));
  }

  /** Activos por prioridad desc, salud desc y orden de registro. */
  listActiveMirrors(): MirrorSite[] {
    this.expireCooldowns();
    return this.mirrors
      .map((mirror, position) => ({ mirror, position }))
      .filter(({ mirror }) => mirror.isActive)
      .sort(
        (a, b) =>
          b.mirror.priority - a.mirror.priority ||
          b.mirror.healthScore - a.mirror.healthScore ||
          a.position - b.position
      )
      .map(({ mirror }) => ({ ...mirror }));
  }

  getMirror(name: string): MirrorSite | null {
    const mirror = this.mirrors.find(m => m.name === name);
    return mirror ? { ...mirror } : null;
  }

  // ---------------------------------------------------------------------------
  // Salud
  // ---------------------------------------------------------------------------

  reportSuccess(name: string): MirrorSite {
    const mirror = this.require(name);
    const previous = mirror.healthScore;
    mirror.healthScore = clampScore(mirror.healthScore + this.settings.successIncrement);
    mirror.failureCount = Math.max(0, mirror.failureCount - this.settings.failureDecay);
    mirror.lastChecked = this.now();
    mirror.lastError = null;
    this.afterHealthChange(mirror, previous);
    return { ...mirror };
  }

  reportFailure(name: string, severity: FailureSeverity, message?: string): MirrorSite {
    const mirror = this.require(name);
    const previous = mirror.healthScore;
    mirror.healthScore = clampScore(
      mirror.healthScore - this.settings.severityDecrements[severity]
    );
    mirror.failureCount += 1;
    mirror.lastChecked = this.now();
    mirror.lastError = message ?? `fallo ${severity}`;
    log.debug(
      `Fallo ${severity} en ${name}: salud ${previous} → ${mirror.healthScore}, fallos ${mirror.failureCount}`
    );
    this.afterHealthChange(mirror, previous);
    return { ...mirror };
  }

  /** Desactiva temporalmente un mirror; vuelve a estar activo pasado `ms`. */
  markUnavailableFor(name: string, ms: number, reason?: string): MirrorSite {
    const mirror = this.require(name);
    const previous = mirror.healthScore;
    mirror.isActive = false;
    mirror.unavailableUntil = this.now() + Math.max(0, ms);
    if (reason) mirror.lastError = reason;
    log.warn(`Mirror ${name} no disponible durante ${Math.round(ms / 1000)}s${reason ? `: ${reason}` : ''}`);
    this.afterHealthChange(mirror, previous);
    return { ...mirror };
  }

  /** Activa o desactiva de forma indefinida (los mirrors nunca se borran). */
  setActive(name: string, active: boolean): MirrorSite {
    const mirror = this.require(name);
    const previous = mirror.healthScore;
    mirror.isActive = active;
    mirror.unavailableUntil = null;
    this.afterHealthChange(mirror, previous);
    return { ...mirror };
  }

  // ---------------------------------------------------------------------------
  // Disponibilidad
  // ---------------------------------------------------------------------------

  markAbsent(name: string, identifier: string): void {
    this.require(name);
    this.recordAvailability({
      mirror: name,
      identifier,
      state: Availability.ABSENT,
      verifiedAt: this.now(),
    });
  }

  markPresent(name: string, identifier: string): void {
    this.require(name);
    this.recordAvailability({
      mirror: name,
      identifier,
      state: Availability.PRESENT,
      verifiedAt: this.now(),
    });
  }

  /**
   * Estado para el par (mirror, identificador). Una ausencia más antigua que
   * absenceTtlMs se considera desconocida.
   */
  getAvailability(name: string, identifier: string): AvailabilityState {
    const record = this.availability.get(identifier)?.get(name);
    if (!record) return Availability.UNKNOWN;
    if (
      record.state === Availability.ABSENT &&
      this.settings.absenceTtlMs > 0 &&
      this.now() - record.verifiedAt > this.settings.absenceTtlMs
    ) {
      return Availability.UNKNOWN;
    }
    return record.state;
  }

  /**
   * Borra las ausencias caducadas, en memoria y en el store.
   * @returns Número de registros eliminados.
   */
  pruneExpiredAvailability(): number {
    if (this.settings.absenceTtlMs <= 0) return 0;
    const now = this.now();
    let removed = 0;
    for (const [identifier, byMirror] of this.availability) {
      for (const [name, record] of byMirror) {
        if (record.state !== Availability.ABSENT || now - record.verifiedAt <= this.settings.absenceTtlMs) continue;
        byMirror.delete(name);
        if (this.writeThrough && this.store) this.store.deleteAvailability(name, identifier);
        removed++;
      }
      if (byMirror.size === 0) this.availability.delete(identifier);
    }
    if (removed > 0) log.debug(`${removed} ausencias caducadas eliminadas`);
    return removed;
  }

  /** Mirrors con ausencia confirmada (vigente) para el identificador. */
  getAbsentMirrors(identifier: string): Set<string> {
    const absent = new Set<string>();
    const byMirror = this.availability.get(identifier);
    if (!byMirror) return absent;
    for (const name of byMirror.keys()) {
      if (this.getAvailability(name, identifier) === Availability.ABSENT) absent.add(name);
    }
    return absent;
  }

  /**
   * Incorpora disponibilidad conocida por el catálogo. No pisa registros más recientes
   * y descarta mirrors que no están registrados.
   */
  importAvailability(records: readonly AvailabilityRecord[]): number {
    let imported = 0;
    for (const record of records) {
      if (!this.mirrors.some(m => m.name === record.mirror)) continue;
      const current = this.availability.get(record.identifier)?.get(record.mirror);
      if (current && current.verifiedAt >= record.verifiedAt) continue;
      this.recordAvailability(record);
      imported++;
    }
    return imported;
  }

  // ---------------------------------------------------------------------------
  // Internos
  // ---------------------------------------------------------------------------

  private require(name: string): MirrorSite {
    const mirror = this.mirrors.find(m => m.name === name);
    if (!mirror) throw new UnknownMirrorError(name);
    return mirror;
  }

  private setAvailabilityRecord(record: AvailabilityRecord): void {
    let byMirror = this.availability.get(record.identifier);
    if (!byMirror) {
      byMirror = new Map();
      this.availability.set(record.identifier, byMirror);
    }
    byMirror.set(record.mirror, { ...record });
  }

  private recordAvailability(record: AvailabilityRecord): void {
    this.setAvailabilityRecord(record);
    if (this.writeThrough && this.store) {
      this.store.saveAvailability(record);
    }
  }

  private expireCooldowns(): void {
    const now = this.now();
    for (const mirror of this.mirrors) {
      if (mirror.unavailableUntil !== null && now >= mirror.unavailableUntil) {
        mirror.isActive = true;
        mirror.unavailableUntil = null;
        log.info(`Mirror ${mirror.name} reactivado tras periodo de indisponibilidad`);
        this.saveMirror(mirror);
      }
    }
  }

  private saveMirror(mirror: MirrorSite): void {
    if (this.writeThrough && this.store) {
      this.store.saveMirror(mirror, this.mirrors.indexOf(mirror));
    }
  }

  private afterHealthChange(mirror: MirrorSite, previousHealth: number): void {
    this.saveMirror(mirror);
    this.events?.emitMirrorHealthChanged({ ...mirror }, previousHealth);
  }
}
