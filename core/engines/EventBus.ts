/**
 * Bus de eventos del motor de descargas.
 *
 * Emite: taskStarted, mirrorSelected, taskProgress, taskCompleted, taskPaused,
 * taskFailed, mirrorHealthChanged, batchCompleted. taskProgress va limitado por
 * tarea (downloads.progressThrottleMs) salvo el último evento de cada transferencia.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type { BatchSummary, ErrorCategory, MirrorSite } from './types';

export interface TaskProgressPayload {
  identifier: string;
  mirror: string;
  bytesTransferred: number;
  totalBytes: number | null;
  /** 0-100, o null si el tamaño es desconocido. */
  percent: number | null;
  speedBytesPerSec: number;
  /** Segundos estimados restantes, o null. */
  remainingTime: number | null;
}

export interface EventBusOptions {
  progressThrottleMs?: number;
  now?: () => number;
}

/**
 * EventEmitter con setMaxListeners(100); cada MirrorDownloader crea el suyo.
 */
class EventBus extends EventEmitter {
  private readonly progressThrottleMs: number;
  private readonly now: () => number;
  private lastProgressAt = new Map<string, number>();

  constructor(options: EventBusOptions = {}) {
    super();
    this.setMaxListeners(100);
    this.progressThrottleMs = options.progressThrottleMs ?? 250;
    this.now = options.now ?? Date.now;
  }

  emitTaskStarted(identifier: string, destinationPath: string, resumeFromByte: number): void {
    this.emit('taskStarted', { identifier, destinationPath, resumeFromByte, timestamp: this.now() });
  }

  emitMirrorSelected(identifier: string, mirror: string, attempt: number, url: string): void {
    this.emit('mirrorSelected', { identifier, mirror, attempt, url, timestamp: this.now() });
  }

  /** Devuelve true si el evento se emitió (no descartado por throttle). */
  emitTaskProgress(progress: TaskProgressPayload, force = false): boolean {
    const now = this.now();
    const last = this.lastProgressAt.get(progress.identifier);
    if (!force && last !== undefined && now - last < this.progressThrottleMs) {
      return false;
    }
    this.lastProgressAt.set(progress.identifier, now);
    this.emit('taskProgress', { ...progress, timestamp: now });
    return true;
  }

  emitTaskCompleted(identifier: string, destinationPath: string, bytes: number, skipped: boolean): void {
    this.lastProgressAt.delete(identifier);
    this.emit('taskCompleted', { identifier, destinationPath, bytes, skipped, timestamp: this.now() });
  }

  emitTaskPaused(identifier: string, bytes: number, reason: string): void {
    this.lastProgressAt.delete(identifier);
    this.emit('taskPaused', { identifier, bytes, reason, timestamp: this.now() });
  }

  emitTaskFailed(identifier: string, category: ErrorCategory, error: Error | string): void {
    this.lastProgressAt.delete(identifier);
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.emit('taskFailed', { identifier, category, error: errorMessage, timestamp: this.now() });
  }

  emitMirrorHealthChanged(mirror: MirrorSite, previousHealth: number): void {
    this.emit('mirrorHealthChanged', {
      mirror: mirror.name,
      healthScore: mirror.healthScore,
      previousHealth,
      failureCount: mirror.failureCount,
      isActive: mirror.isActive,
      timestamp: this.now(),
    });
  }

  emitBatchCompleted(summary: BatchSummary): void {
    this.emit('batchCompleted', { ...summary, timestamp: this.now() });
  }

  /** Quita todos los listeners y el estado de throttle. */
  clear(): void {
    this.lastProgressAt.clear();
    this.removeAllListeners();
  }
}

export { EventBus };
export default EventBus;
