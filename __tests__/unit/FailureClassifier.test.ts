/**
 * Tests unitarios para core/engines/FailureClassifier.ts
 */
import { FailureClassifier, exhaustedDecision } from '../../core/engines/FailureClassifier';
import { MirrorRegistry } from '../../core/engines/MirrorRegistry';
import { TransferError } from '../../core/engines/TransferError';
import { createDefaultConfig } from '../../core/config';
import type { CompletedTransfer, TransferErrorKind, TransferOutcome } from '../../core/engines/types';

const defaults = createDefaultConfig('/tmp/classifier-test');

function failed(kind: TransferErrorKind, details: { retryAfterMs?: number; code?: string } = {}): TransferOutcome {
  return {
    status: 'failed',
    bytesTransferred: 0,
    bytesReceived: 0,
    error: new TransferError(kind, `fallo ${kind}`, details),
  };
}

const completed: CompletedTransfer = {
  status: 'completed',
  bytesTransferred: 100,
  bytesReceived: 100,
  resumed: false,
  skipped: false,
};

describe('FailureClassifier', () => {
  let registry: MirrorRegistry;
  let classifier: FailureClassifier;

  beforeEach(() => {
    registry = new MirrorRegistry({ settings: defaults.mirrors });
    registry.upsertMirror({ name: 'alpha', baseUrl: 'https://alpha.example' });
    classifier = new FailureClassifier(registry, {
      downloads: { maxSameMirrorRetries: 2, maxAttemptsPerTask: 5 },
      retryProfiles: defaults.retryProfiles,
      random: () => 0,
    });
  });

  describe('classify', () => {
    it('debe completar con un resultado completed', () => {
      expect(classifier.classify(completed, { sameMirrorRetries: 0, attempt: 1 })).toEqual({ action: 'complete' });
    });

    it('debe pedir otro mirror sin espera ante not_found', () => {
      expect(classifier.classify(failed('not_found'), { sameMirrorRetries: 0, attempt: 1 })).toEqual({
        action: 'retry-different-mirror',
        delayMs: 0,
        category: 'NotFound',
        reason: 'fallo not_found',
      });
    });

    it('debe reintentar el mismo mirror tras Retry-After ante rate_limited', () => {
      const decision = classifier.classify(failed('rate_limited', { retryAfterMs: 7000 }), {
        sameMirrorRetries: 0,
        attempt: 1,
      });
      expect(decision).toMatchObject({ action: 'retry-same-mirror', delayMs: 7000, category: 'RateLimited' });
    });

    it('debe usar el perfil server_overload si el 429 no trae Retry-After', () => {
      const decision = classifier.classify(failed('rate_limited'), { sameMirrorRetries: 1, attempt: 2 });
      expect(decision).toMatchObject({ action: 'retry-same-mirror', delayMs: 60_000 });
    });

    it('debe reintentar el mismo mirror con backoff ante timeout hasta el máximo y luego cambiar', () => {
      const timeout = failed('timeout', { code: 'ETIMEDOUT' });

      expect(classifier.classify(timeout, { sameMirrorRetries: 0, attempt: 1 })).toMatchObject({
        action: 'retry-same-mirror',
        delayMs: 2000,
        category: 'Transient',
      });
      expect(classifier.classify(timeout, { sameMirrorRetries: 1, attempt: 2 })).toMatchObject({
        action: 'retry-same-mirror',
        delayMs: 3000,
      });
      expect(classifier.classify(timeout, { sameMirrorRetries: 2, attempt: 3 })).toMatchObject({
        action: 'retry-different-mirror',
        delayMs: 0,
      });
    });

    it('debe aplicar el perfil de conexión reseteada', () => {
      const reset = failed('connection', { code: 'ECONNRESET' });
      expect(classifier.classify(reset, { sameMirrorRetries: 1, attempt: 2 })).toMatchObject({
        action: 'retry-same-mirror',
        delayMs: 6000,
      });
    });

    it('debe cambiar de mirror tras una espera corta ante 5xx', () => {
      expect(classifier.classify(failed('server_error'), { sameMirrorRetries: 0, attempt: 1 })).toMatchObject({
        action: 'retry-different-mirror',
        delayMs: 500,
        category: 'Transient',
      });
    });

    it('debe cambiar de mirror sin espera ante integrity_mismatch', () => {
      expect(classifier.classify(failed('integrity_mismatch'), { sameMirrorRetries: 0, attempt: 1 })).toEqual({
        action: 'retry-different-mirror',
        delayMs: 0,
        category: 'IntegrityMismatch',
        reason: 'fallo integrity_mismatch',
      });
    });

    it('debe detener el lote ante un error de sistema de archivos', () => {
      expect(classifier.classify(failed('filesystem'), { sameMirrorRetries: 0, attempt: 1 })).toEqual({
        action: 'fatal',
        scope: 'batch',
        category: 'Fatal',
        reason: 'fallo filesystem',
      });
    });

    it('debe fallar la tarea al alcanzar el máximo de intentos', () => {
      const decision = classifier.classify(failed('server_error'), { sameMirrorRetries: 0, attempt: 5 });
      expect(decision).toMatchObject({ action: 'fatal', scope: 'task', category: 'Transient' });
      expect('reason' in decision ? decision.reason : '').toBe(
        'Se alcanzó el máximo de intentos para la tarea (5): fallo server_error'
      );
    });

    it('debe pausar sin reintento ante una cancelación', () => {
      const cancelled: TransferOutcome = {
        status: 'partial',
        bytesTransferred: 10,
        bytesReceived: 10,
        reason: 'cancelled',
        error: null,
      };
      expect(classifier.classify(cancelled, { sameMirrorRetries: 0, attempt: 1 })).toEqual({
        action: 'pause-for-resume',
        retry: false,
        delayMs: 0,
        category: 'Transient',
        reason: 'cancelled',
      });
    });

    it('debe pausar para reanudar con reintento ante una interrupción', () => {
      const interrupted: TransferOutcome = {
        status: 'partial',
        bytesTransferred: 10,
        bytesReceived: 10,
        reason: 'interrupted',
        error: new TransferError('timeout', 'socket inactivo', { code: 'ETIMEDOUT' }),
      };
      expect(classifier.classify(interrupted, { sameMirrorRetries: 0, attempt: 1 })).toEqual({
        action: 'pause-for-resume',
        retry: true,
        delayMs: 2000,
        category: 'Transient',
        reason: 'socket inactivo',
      });
      expect(classifier.classify(interrupted, { sameMirrorRetries: 0, attempt: 5 })).toMatchObject({
        action: 'pause-for-resume',
        retry: false,
      });
    });
  });

  describe('apply', () => {
    it('debe reportar éxito y presencia al completar', () => {
      registry.reportFailure('alpha', 'moderate');
      classifier.apply('alpha', '42', completed, { sameMirrorRetries: 0, attempt: 1 });

      expect(registry.getMirror('alpha')?.healthScore).toBe(0.9);
      expect(registry.getAvailability('alpha', '42')).toBe('present');
    });

    it('no debe tocar el registro si el destino ya estaba completo', () => {
      classifier.apply('alpha', '42', { ...completed, skipped: true }, {
        sameMirrorRetries: 0,
        attempt: 1,
      });
      expect(registry.getAvailability('alpha', '42')).toBe('unknown');
      expect(registry.getMirror('alpha')?.lastChecked).toBeNull();
    });

    it('debe marcar ausencia con penalización leve ante not_found', () => {
      classifier.apply('alpha', '42', failed('not_found'), { sameMirrorRetries: 0, attempt: 1 });

      expect(registry.getAvailability('alpha', '42')).toBe('absent');
      expect(registry.getMirror('alpha')).toMatchObject({ healthScore: 0.95, failureCount: 1 });
    });

    it('debe penalizar más un 5xx que un not_found', () => {
      classifier.apply('alpha', '42', failed('server_error'), { sameMirrorRetries: 0, attempt: 1 });
      expect(registry.getMirror('alpha')).toMatchObject({ healthScore: 0.8, lastError: 'fallo server_error' });
      expect(registry.getAvailability('alpha', '42')).toBe('unknown');
    });

    it('no debe penalizar al mirror por errores locales', () => {
      const decision = classifier.apply('alpha', '42', failed('filesystem'), { sameMirrorRetries: 0, attempt: 1 });
      expect(decision.action).toBe('fatal');
      expect(registry.getMirror('alpha')?.healthScore).toBe(1);
    });

    it('debe aplicar la penalización aunque se agoten los intentos', () => {
      classifier.apply('alpha', '42', failed('timeout'), { sameMirrorRetries: 0, attempt: 5 });
      expect(registry.getMirror('alpha')?.healthScore).toBe(0.8);
    });
  });

  describe('exhaustedDecision', () => {
    it('debe devolver un fallo de tarea de categoría Exhausted', () => {
      expect(exhaustedDecision()).toEqual({
        action: 'fatal',
        scope: 'task',
        category: 'Exhausted',
        reason: 'No quedan mirrors elegibles para este identificador',
      });
      expect(exhaustedDecision('sin mirrors').reason).toBe('sin mirrors');
    });
  });
});
