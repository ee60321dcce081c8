/**
 * Traduce el resultado de un intento en una decisión (reintentar, pausar, fallar o
 * completar) y aplica los efectos sobre el registro de mirrors.
 *
 * @module FailureClassifier
 */

import config from '../config';
import type { AppConfig, FailureSeverity, RetryProfile, RetryProfileName } from '../config';
import { logger } from '../utils/logger';
import { TASK_ERRORS } from '../constants/errors';
import { calculateAdaptiveRetryDelay } from './RetryPolicy';
import { errorCategory } from './TransferError';
import type { MirrorRegistry } from './MirrorRegistry';
import type { AttemptContext, FailureDecision, TransferOutcome } from './types';

const log = logger.child('FailureClassifier');

export interface FailureClassifierOptions {
  downloads?: Pick<AppConfig['downloads'], 'maxSameMirrorRetries' | 'maxAttemptsPerTask'>;
  retryProfiles?: Record<RetryProfileName, RetryProfile>;
  random?: () => number;
}

/** Efecto sobre el registro derivado de un resultado. */
interface RegistryEffect {
  success: boolean;
  severity: FailureSeverity | null;
  absent: boolean;
}

export type FatalDecision = Extract<FailureDecision, { action: 'fatal' }>;

const NO_EFFECT: RegistryEffect = { success: false, severity: null, absent: false };

/** Decisión de agotamiento: ningún mirror elegible queda para la tarea. */
export function exhaustedDecision(reason: string = TASK_ERRORS.EXHAUSTED): FatalDecision {
  return { action: 'fatal', scope: 'task', category: 'Exhausted', reason };
}

export class FailureClassifier {
  private readonly registry: MirrorRegistry;
  private readonly maxSameMirrorRetries: number;
  private readonly maxAttemptsPerTask: number;
  private readonly retryProfiles: Record<RetryProfileName, RetryProfile>;
  private readonly random: () => number;

  constructor(registry: MirrorRegistry, options: FailureClassifierOptions = {}) {
    this.registry = registry;
    this.maxSameMirrorRetries = options.downloads?.maxSameMirrorRetries ?? config.downloads.maxSameMirrorRetries;
    this.maxAttemptsPerTask = options.downloads?.maxAttemptsPerTask ?? config.downloads.maxAttemptsPerTask;
    this.retryProfiles = options.retryProfiles ?? config.retryProfiles;
    this.random = options.random ?? Math.random;
  }

  /** Decisión pura, sin efectos sobre el registro. */
  classify(outcome: TransferOutcome, context: AttemptContext): FailureDecision {
    if (outcome.status === 'completed') {
      return { action: 'complete' };
    }

    if (outcome.status === 'partial') {
      if (outcome.reason === 'cancelled') {
        return { action: 'pause-for-resume', retry: false, delayMs: 0, category: 'Transient', reason: 'cancelled' };
      }
      const retry = context.attempt < this.maxAttemptsPerTask;
      return {
        action: 'pause-for-resume',
        retry,
        delayMs: retry ? this.delayFor(context.sameMirrorRetries, outcome.error) : 0,
        category: 'Transient',
        reason: outcome.error?.message ?? 'interrupted',
      };
    }

    const { error } = outcome;
    const category = errorCategory(error.kind);

    if (category === 'Fatal') {
      return { action: 'fatal', scope: 'batch', category, reason: error.message };
    }

    // Los no-fatales consumen intentos; al agotar el máximo la tarea falla
    if (context.attempt >= this.maxAttemptsPerTask) {
      return {
        action: 'fatal',
        scope: 'task',
        category,
        reason: `${TASK_ERRORS.MAX_ATTEMPTS} (${context.attempt}): ${error.message}`,
      };
    }

    switch (error.kind) {
      case 'not_found':
        return { action: 'retry-different-mirror', delayMs: 0, category, reason: error.message };
      case 'rate_limited':
        return {
          action: 'retry-same-mirror',
          delayMs: this.delayFor(context.sameMirrorRetries, error),
          category,
          reason: error.message,
        };
      case 'timeout':
      case 'connection':
        if (context.sameMirrorRetries < this.maxSameMirrorRetries) {
          return {
            action: 'retry-same-mirror',
            delayMs: this.delayFor(context.sameMirrorRetries, error),
            category,
            reason: error.message,
          };
        }
        return { action: 'retry-different-mirror', delayMs: 0, category, reason: error.message };
      case 'server_error':
      case 'http_error':
        return {
          action: 'retry-different-mirror',
          delayMs: this.delayFor(0, error),
          category,
          reason: error.message,
        };
      case 'integrity_mismatch':
        return { action: 'retry-different-mirror', delayMs: 0, category, reason: error.message };
      case 'filesystem':
      case 'invalid_request':
        return { action: 'fatal', scope: 'batch', category: 'Fatal', reason: error.message };
    }
  }

  /**
   * Clasifica y aplica los efectos sobre el registro (salud, disponibilidad).
   * Los efectos se aplican siempre, aunque la decisión sea fallo por máximo de intentos.
   */
  apply(
    mirrorName: string,
    identifier: string,
    outcome: TransferOutcome,
    context: AttemptContext
  ): FailureDecision {
    const decision = this.classify(outcome, context);
    const effect = this.effectOf(outcome);

    if (effect.success) {
      this.registry.reportSuccess(mirrorName);
      this.registry.markPresent(mirrorName, identifier);
    }
    if (effect.absent) {
      this.registry.markAbsent(mirrorName, identifier);
    }
    if (effect.severity) {
      const message = outcome.status === 'completed' ? undefined : (outcome.error?.message ?? outcome.status);
      this.registry.reportFailure(mirrorName, effect.severity, message);
    }

    if (decision.action !== 'complete') {
      log.debug(`${identifier}@${mirrorName}: ${decision.action} (${'reason' in decision ? decision.reason : ''})`);
    }
    return decision;
  }

  private effectOf(outcome: TransferOutcome): RegistryEffect {
    if (outcome.status === 'completed') {
      // Un destino ya completo no dice nada del mirror
      return outcome.skipped ? NO_EFFECT : { success: true, severity: null, absent: false };
    }
    if (outcome.status === 'partial') {
      return outcome.reason === 'cancelled' ? NO_EFFECT : { success: false, severity: 'minor', absent: false };
    }
    switch (outcome.error.kind) {
      case 'not_found':
        return { success: false, severity: 'minor', absent: true };
      case 'rate_limited':
        return { success: false, severity: 'minor', absent: false };
      case 'timeout':
      case 'connection':
      case 'server_error':
      case 'http_error':
      case 'integrity_mismatch':
        return { success: false, severity: 'moderate', absent: false };
      case 'filesystem':
      case 'invalid_request':
        return NO_EFFECT;
    }
  }

  private delayFor(retryCount: number, error: unknown): number {
    return calculateAdaptiveRetryDelay(retryCount, error, {
      profiles: this.retryProfiles,
      random: this.random,
    });
  }
}
