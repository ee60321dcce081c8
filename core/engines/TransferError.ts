/**
 * Error tipado de transferencia. `kind` determina la decisión del clasificador;
 * errorCategory lo proyecta sobre la taxonomía visible para el llamador.
 *
 * @module engines/TransferError
 */

import type { ErrorCategory, TransferErrorKind } from './types';

export interface TransferErrorDetails {
  statusCode?: number | null;
  retryAfterMs?: number | null;
  /** Código de sistema (ECONNRESET, ENOSPC, ...). */
  code?: string;
  cause?: unknown;
}

export class TransferError extends Error {
  readonly kind: TransferErrorKind;
  readonly statusCode: number | null;
  readonly retryAfterMs: number | null;
  readonly code: string | undefined;

  constructor(kind: TransferErrorKind, message: string, details: TransferErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'TransferError';
    this.kind = kind;
    this.statusCode = details.statusCode ?? null;
    this.retryAfterMs = details.retryAfterMs ?? null;
    this.code = details.code;
  }
}

export function errorCategory(kind: TransferErrorKind): ErrorCategory {
  switch (kind) {
    case 'not_found':
      return 'NotFound';
    case 'rate_limited':
      return 'RateLimited';
    case 'integrity_mismatch':
      return 'IntegrityMismatch';
    case 'filesystem':
    case 'invalid_request':
      return 'Fatal';
    case 'server_error':
    case 'http_error':
    case 'timeout':
    case 'connection':
      return 'Transient';
  }
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Mensaje de un error sin depender de `instanceof Error`: los errores que lanzan
 * los módulos nativos pueden venir de otro contexto (vm) con otro prototipo Error.
 */
function readErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
}

/** Envuelve un error de fs en un TransferError fatal conservando el código. */
export function toFilesystemError(error: unknown, context: string): TransferError {
  if (error instanceof TransferError) return error;
  const message = readErrorMessage(error);
  return new TransferError('filesystem', `${context}: ${message}`, {
    code: readErrorCode(error),
    cause: error,
  });
}

export { readErrorCode, readErrorMessage };
