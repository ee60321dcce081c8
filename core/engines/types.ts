/**
 * Tipos compartidos del motor: mirrors, disponibilidad, tareas, resultados de
 * transferencia, decisiones del clasificador y contrato del catálogo externo.
 *
 * @module engines/types
 */

import type { TransferError } from './TransferError';

/** Estados de una tarea de transferencia. */
export const TaskStatus = {
  PENDING: 'pending',
  IN_FLIGHT: 'in-flight',
  PAUSED: 'paused',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type TaskStatusValue = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Conocimiento sobre la presencia de un identificador en un mirror. */
export const Availability = {
  UNKNOWN: 'unknown',
  PRESENT: 'present',
  ABSENT: 'absent',
} as const;

export type AvailabilityState = (typeof Availability)[keyof typeof Availability];

export interface MirrorSite {
  name: string;
  /** Normalizada sin barra final. */
  baseUrl: string;
  country: string | null;
  /** Mayor = preferido. */
  priority: number;
  isActive: boolean;
  /** Siempre en [0, 1]. */
  healthScore: number;
  failureCount: number;
  lastChecked: number | null;
  lastError: string | null;
  /** Desactivación temporal; pasado este instante el mirror vuelve a estar activo. */
  unavailableUntil: number | null;
}

export interface AvailabilityRecord {
  mirror: string;
  identifier: string;
  state: Exclude<AvailabilityState, 'unknown'>;
  verifiedAt: number;
}

export interface TransferTask {
  identifier: string;
  destinationPath: string;
  /** Ruta del recurso relativa a la URL base de cada mirror. */
  canonicalPath: string;
  expectedSize: number | null;
  bytesTransferred: number;
  status: TaskStatusValue;
  attemptCount: number;
  lastMirrorTried: string | null;
  priority: number;
  /** Orden de envío dentro del lote (desempate de prioridad). */
  submissionIndex: number;
  /** Mirrors restringidos por el catálogo; null = todos. */
  candidateMirrors: string[] | null;
}

// ---------------------------------------------------------------------------
// Resultado de una transferencia
// ---------------------------------------------------------------------------

export type TransferErrorKind =
  | 'not_found'
  | 'server_error'
  | 'http_error'
  | 'rate_limited'
  | 'timeout'
  | 'connection'
  | 'integrity_mismatch'
  | 'filesystem'
  | 'invalid_request';

export interface CompletedTransfer {
  status: 'completed';
  /** Tamaño final del archivo en disco. */
  bytesTransferred: number;
  /** Bytes recibidos por la red en esta llamada. */
  bytesReceived: number;
  resumed: boolean;
  /** true si el destino ya estaba completo y no hubo petición. */
  skipped: boolean;
}

export interface PartialTransfer {
  status: 'partial';
  bytesTransferred: number;
  bytesReceived: number;
  reason: 'interrupted' | 'cancelled';
  error: TransferError | null;
}

export interface FailedTransfer {
  status: 'failed';
  bytesTransferred: number;
  bytesReceived: number;
  error: TransferError;
}

export type TransferOutcome = CompletedTransfer | PartialTransfer | FailedTransfer;

export interface TransferProgress {
  bytesTransferred: number;
  totalBytes: number | null;
  chunkBytes: number;
}

export type ProgressObserver = (_progress: TransferProgress) => void;

// ---------------------------------------------------------------------------
// Clasificación de fallos
// ---------------------------------------------------------------------------

/** Taxonomía visible para el llamador. */
export type ErrorCategory =
  | 'NotFound'
  | 'Transient'
  | 'RateLimited'
  | 'IntegrityMismatch'
  | 'Exhausted'
  | 'Fatal';

export type FailureDecision =
  | { action: 'complete' }
  | { action: 'retry-same-mirror'; delayMs: number; category: ErrorCategory; reason: string }
  | { action: 'retry-different-mirror'; delayMs: number; category: ErrorCategory; reason: string }
  | { action: 'pause-for-resume'; retry: boolean; delayMs: number; category: ErrorCategory; reason: string }
  | { action: 'fatal'; scope: 'task' | 'batch'; category: ErrorCategory; reason: string };

/** Contexto del intento que el clasificador necesita para decidir. */
export interface AttemptContext {
  /** Reintentos consecutivos ya hechos contra el mismo mirror. */
  sameMirrorRetries: number;
  /** Intentos totales de la tarea, incluido el actual. */
  attempt: number;
}

// ---------------------------------------------------------------------------
// Resultados de lote
// ---------------------------------------------------------------------------

interface TaskResultBase {
  identifier: string;
  destinationPath: string;
  bytesTransferred: number;
  attempts: number;
  mirror: string | null;
}

export interface CompletedTaskResult extends TaskResultBase {
  status: 'completed';
  skipped: boolean;
}

export interface PausedTaskResult extends TaskResultBase {
  status: 'paused';
  /** false si la tarea nunca llegó a despacharse. */
  started: boolean;
  reason: string;
}

export interface FailedTaskResult extends TaskResultBase {
  status: 'failed';
  category: ErrorCategory;
  reason: string;
  /** true si el fallo detiene el lote completo. */
  haltsBatch: boolean;
}

export type TaskResult = CompletedTaskResult | PausedTaskResult | FailedTaskResult;

export interface BatchSummary {
  total: number;
  completed: number;
  skipped: number;
  paused: number;
  failed: number;
  bytesTransferred: number;
  peakInFlight: number;
  durationMs: number;
  aborted: boolean;
}

export interface BatchResult {
  results: TaskResult[];
  summary: BatchSummary;
}

// ---------------------------------------------------------------------------
// Catálogo externo
// ---------------------------------------------------------------------------

export interface CatalogEntry {
  canonicalPath: string;
  expectedSize?: number | null;
  /** Restringe la selección a estos mirrors (por nombre). */
  candidateMirrors?: string[];
  /** Disponibilidad por mirror ya conocida por el catálogo. */
  availability?: Array<{ mirror: string; state: Exclude<AvailabilityState, 'unknown'>; verifiedAt?: number }>;
}

/**
 * Colaborador externo: dado un identificador devuelve la ruta canónica, el tamaño
 * esperado y la disponibilidad por mirror conocida.
 */
export interface CatalogProvider {
  resolve(identifier: string): CatalogEntry | null | Promise<CatalogEntry | null>;
}
