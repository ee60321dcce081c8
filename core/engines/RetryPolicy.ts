/**
 * Utilidades de red para decidir reintentos.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, ETIMEDOUT, etc.).
 * classifyTransientError: asigna el perfil de retry según el tipo de fallo.
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 * calculateAdaptiveRetryDelay: backoff exponencial acotado con jitter por perfil.
 *
 * @module engines/RetryPolicy
 */

import config from '../config';
import type { RetryProfile, RetryProfileName } from '../config';
import { logger } from '../utils/logger';
import { TransferError, readErrorCode, readErrorMessage } from './TransferError';

const log = logger.child('RetryPolicy');

const TRANSIENT_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'UND_ERR_SOCKET',
];

/** Indica si el error es de red transitorio (reintento razonable). */
export function isTransientNetworkError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof TransferError) {
    return error.kind === 'timeout' || error.kind === 'connection';
  }
  const code = readErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.includes(code)) return true;

  const message = readErrorMessage(error);
  return /socket hang up|aborted|timed? ?out/i.test(message);
}

/**
 * Clasifica un error de red transitorio en una categoría específica.
 *
 * - `timeout`: el servidor no respondió a tiempo (vivo pero lento).
 * - `connection_reset`: conexión interrumpida (ECONNRESET, socket hang up).
 * - `connection_refused`: servidor rechaza conexiones o host inalcanzable.
 * - `dns`: resolución DNS falló (ENOTFOUND, EAI_AGAIN).
 * - `pipe_broken`: escritura en socket cerrado (EPIPE).
 * - `server_overload`: el servidor pide esperar (429).
 * - `server_error`: respuesta 5xx.
 * - `unknown`: error no clasificado; fallback a backoff genérico.
 */
export function classifyTransientError(error: unknown): RetryProfileName {
  if (!error) return 'unknown';

  if (error instanceof TransferError) {
    if (error.kind === 'rate_limited') return 'server_overload';
    if (error.kind === 'server_error') return 'server_error';
    if (error.kind === 'timeout') return 'timeout';
  }

  const code = readErrorCode(error) ?? '';
  const msg = readErrorMessage(error);

  if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT' || /timeout/i.test(msg)) {
    return 'timeout';
  }
  if (code === 'ECONNRESET' || code === 'ECONNABORTED' || /socket hang up|aborted/i.test(msg)) {
    return 'connection_reset';
  }
  if (code === 'ECONNREFUSED' || code === 'ENETUNREACH' || code === 'EHOSTUNREACH') {
    return 'connection_refused';
  }
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'dns';
  }
  if (code === 'EPIPE') {
    return 'pipe_broken';
  }
  return 'unknown';
}

export interface ParseRetryAfterOptions {
  maxMs?: number;
  now?: number;
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms o null. */
export function parseRetryAfter(
  retryAfter: string | string[] | undefined,
  opts: ParseRetryAfterOptions = {}
): number | null {
  const raw = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!raw) return null;
  const max = opts.maxMs ?? config.network.retryAfterMaxMs;
  const s = raw.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, max);
  }
  const date = new Date(s);
  if (!Number.isNaN(date.getTime())) {
    const ms = date.getTime() - (opts.now ?? Date.now());
    return ms > 0 ? Math.min(ms, max) : 0;
  }
  return null;
}

export interface RetryDelayOptions {
  profiles?: Record<RetryProfileName, RetryProfile>;
  random?: () => number;
}

/**
 * Calcula el delay de reintento adaptado al tipo de error.
 *
 * Si el error trae `retryAfterMs` (429 con Retry-After) ese valor tiene prioridad.
 *
 * @param retryCount - Número de reintentos previos (0-based).
 * @param error - El error original.
 * @returns Delay en ms antes del próximo reintento.
 */
export function calculateAdaptiveRetryDelay(
  retryCount: number,
  error: unknown,
  options: RetryDelayOptions = {}
): number {
  if (error instanceof TransferError && error.retryAfterMs != null && error.retryAfterMs >= 0) {
    return error.retryAfterMs;
  }

  const errorType = classifyTransientError(error);
  const profiles = options.profiles ?? config.retryProfiles;
  const profile = profiles[errorType];
  const random = options.random ?? Math.random;

  const exponentialDelay = profile.baseDelayMs * Math.pow(profile.growthFactor, retryCount);
  const jitter = random() * profile.jitterFactor * exponentialDelay;
  const delay = Math.min(exponentialDelay + jitter, profile.maxDelayMs);

  log.debug(
    `[AdaptiveRetry] error=${errorType}, retryCount=${retryCount}, delay=${Math.round(delay)}ms ` +
      `(base=${profile.baseDelayMs}, max=${profile.maxDelayMs}, growth=${profile.growthFactor})`
  );

  return Math.round(delay);
}
