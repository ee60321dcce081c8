/**
 * Tests unitarios para core/engines/RetryPolicy.ts
 */
import vm from 'vm';
import {
  isTransientNetworkError,
  classifyTransientError,
  parseRetryAfter,
  calculateAdaptiveRetryDelay,
} from '../../core/engines/RetryPolicy';
import { TransferError, errorCategory, toFilesystemError } from '../../core/engines/TransferError';
import { toNetworkError } from '../../core/utils/httpRequest';
import { createDefaultConfig } from '../../core/config';

function errnoError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

/** Error creado en otro contexto vm: no es `instanceof Error` en este. */
function foreignError(code: string, message: string): unknown {
  return vm.runInNewContext('Object.assign(new Error(message), { code })', { code, message });
}

const profiles = createDefaultConfig('/tmp/retry-test').retryProfiles;

describe('RetryPolicy', () => {
  describe('isTransientNetworkError', () => {
    it('debe reconocer códigos de red transitorios', () => {
      expect(isTransientNetworkError(errnoError('ECONNRESET'))).toBe(true);
      expect(isTransientNetworkError(errnoError('EAI_AGAIN'))).toBe(true);
      expect(isTransientNetworkError(new Error('socket hang up'))).toBe(true);
    });

    it('debe reconocer TransferError de timeout y conexión', () => {
      expect(isTransientNetworkError(new TransferError('timeout', 't'))).toBe(true);
      expect(isTransientNetworkError(new TransferError('connection', 'c'))).toBe(true);
      expect(isTransientNetworkError(new TransferError('not_found', 'n'))).toBe(false);
    });

    it('debe rechazar errores no de red', () => {
      expect(isTransientNetworkError(null)).toBe(false);
      expect(isTransientNetworkError(errnoError('ENOSPC'))).toBe(false);
    });
  });

  describe('classifyTransientError', () => {
    it('debe asignar el perfil según el código', () => {
      expect(classifyTransientError(errnoError('ETIMEDOUT'))).toBe('timeout');
      expect(classifyTransientError(errnoError('ECONNRESET'))).toBe('connection_reset');
      expect(classifyTransientError(errnoError('ECONNREFUSED'))).toBe('connection_refused');
      expect(classifyTransientError(errnoError('ENOTFOUND'))).toBe('dns');
      expect(classifyTransientError(errnoError('EPIPE'))).toBe('pipe_broken');
      expect(classifyTransientError(errnoError('EWHATEVER', 'raro'))).toBe('unknown');
    });

    it('debe asignar el perfil según el tipo de TransferError', () => {
      expect(classifyTransientError(new TransferError('rate_limited', '429'))).toBe('server_overload');
      expect(classifyTransientError(new TransferError('server_error', '503'))).toBe('server_error');
      expect(classifyTransientError(new TransferError('timeout', 'lento'))).toBe('timeout');
    });
  });

  describe('parseRetryAfter', () => {
    it('debe convertir segundos a ms', () => {
      expect(parseRetryAfter('7')).toBe(7000);
      expect(parseRetryAfter(['3', '9'])).toBe(3000);
    });

    it('debe acotar al máximo', () => {
      expect(parseRetryAfter('100000', { maxMs: 60_000 })).toBe(60_000);
    });

    it('debe aceptar fechas HTTP', () => {
      const now = Date.parse('2024-01-01T00:00:00Z');
      expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:30 GMT', { now })).toBe(30_000);
      expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', { now })).toBe(0);
    });

    it('debe devolver null con valores ausentes o ilegibles', () => {
      expect(parseRetryAfter(undefined)).toBeNull();
      expect(parseRetryAfter('pronto')).toBeNull();
    });
  });

  describe('calculateAdaptiveRetryDelay', () => {
    it('debe priorizar retryAfterMs del error', () => {
      const error = new TransferError('rate_limited', '429', { retryAfterMs: 4500 });
      expect(calculateAdaptiveRetryDelay(3, error, { profiles })).toBe(4500);
    });

    it('debe crecer de forma exponencial sin jitter', () => {
      const error = errnoError('ECONNRESET');
      const random = (): number => 0;
      expect(calculateAdaptiveRetryDelay(0, error, { profiles, random })).toBe(3000);
      expect(calculateAdaptiveRetryDelay(1, error, { profiles, random })).toBe(6000);
      expect(calculateAdaptiveRetryDelay(2, error, { profiles, random })).toBe(12_000);
    });

    it('debe respetar el máximo del perfil', () => {
      const error = errnoError('ECONNRESET');
      expect(calculateAdaptiveRetryDelay(10, error, { profiles, random: () => 0 })).toBe(30_000);
    });

    it('debe añadir jitter proporcional', () => {
      const error = errnoError('ECONNRESET');
      expect(calculateAdaptiveRetryDelay(0, error, { profiles, random: () => 1 })).toBe(3900);
    });
  });
});

describe('TransferError', () => {
  it('debe proyectar cada tipo sobre la taxonomía visible', () => {
    expect(errorCategory('not_found')).toBe('NotFound');
    expect(errorCategory('rate_limited')).toBe('RateLimited');
    expect(errorCategory('integrity_mismatch')).toBe('IntegrityMismatch');
    expect(errorCategory('server_error')).toBe('Transient');
    expect(errorCategory('connection')).toBe('Transient');
    expect(errorCategory('filesystem')).toBe('Fatal');
  });

  it('debe envolver errores de fs conservando el código', () => {
    const wrapped = toFilesystemError(errnoError('ENOSPC', 'no space left'), 'escribiendo');
    expect(wrapped.kind).toBe('filesystem');
    expect(wrapped.code).toBe('ENOSPC');
    expect(wrapped.message).toBe('escribiendo: no space left');
  });

  describe('errores de otro contexto', () => {
    it('el error de prueba no debe ser instanceof Error', () => {
      expect(foreignError('ENOENT', 'x') instanceof Error).toBe(false);
    });

    it('toFilesystemError debe conservar mensaje y código', () => {
      const wrapped = toFilesystemError(foreignError('EACCES', 'permission denied'), 'abriendo');
      expect(wrapped.message).toBe('abriendo: permission denied');
      expect(wrapped.code).toBe('EACCES');
    });

    it('toNetworkError debe clasificar ETIMEDOUT como timeout', () => {
      const wrapped = toNetworkError(foreignError('ETIMEDOUT', 'connect ETIMEDOUT 10.0.0.1:80'));
      expect(wrapped.kind).toBe('timeout');
      expect(wrapped.code).toBe('ETIMEDOUT');
      expect(wrapped.message).toBe('Timeout de red: connect ETIMEDOUT 10.0.0.1:80');
    });

    it('toNetworkError debe conservar el código de los errores de conexión', () => {
      const wrapped = toNetworkError(foreignError('ECONNREFUSED', 'connect ECONNREFUSED'));
      expect(wrapped.kind).toBe('connection');
      expect(wrapped.code).toBe('ECONNREFUSED');
    });

    it('classifyTransientError debe leer el mensaje', () => {
      expect(classifyTransientError(foreignError('', 'socket hang up'))).toBe('connection_reset');
      expect(isTransientNetworkError(foreignError('', 'request timed out'))).toBe(true);
    });
  });
});
