/**
 * Despacho acotado de las tareas de un lote.
 *
 * Cola por prioridad (desc) y orden de envío; como mucho `maxConcurrency` workers en vuelo
 * (ConcurrencyController). Un resultado fatal con haltsBatch, o la señal del llamador,
 * aborta el lote: los workers en vuelo reciben la señal y pausan, y las tareas no
 * despachadas se devuelven como `paused` con `started: false`.
 *
 * @module ConcurrencyCoordinator
 */

import config from '../config';
import { logger } from '../utils/logger';
import { TASK_ERRORS } from '../constants/errors';
import { ConcurrencyController } from './ConcurrencyController';
import { transitionTask } from './TaskStateMachine';
import { TaskStatus } from './types';
import type { TaskResult, TransferTask } from './types';

const log = logger.child('ConcurrencyCoordinator');

export type TaskWorker = (_task: TransferTask, _signal: AbortSignal) => Promise<TaskResult>;

export interface CoordinatorRunOptions {
  maxConcurrency?: number;
  signal?: AbortSignal;
}

export interface CoordinatorRunStats {
  peakInFlight: number;
  aborted: boolean;
  /** Motivo del fallo fatal que detuvo el lote, si lo hubo. */
  haltReason: string | null;
}

/** Cola de despacho: prioridad descendente, luego orden de envío. */
export function dispatchOrder(tasks: readonly TransferTask[]): TransferTask[] {
  return [...tasks].sort((a, b) => b.priority - a.priority || a.submissionIndex - b.submissionIndex);
}

function notStartedResult(task: TransferTask, reason: string): TaskResult {
  return {
    status: 'paused',
    identifier: task.identifier,
    destinationPath: task.destinationPath,
    bytesTransferred: task.bytesTransferred,
    attempts: task.attemptCount,
    mirror: task.lastMirrorTried,
    started: false,
    reason,
  };
}

export class ConcurrencyCoordinator {
  private readonly defaultMaxConcurrency: number;
  private _lastRun: CoordinatorRunStats = { peakInFlight: 0, aborted: false, haltReason: null };

  constructor(defaultMaxConcurrency: number = config.downloads.maxConcurrency) {
    this.defaultMaxConcurrency = defaultMaxConcurrency;
  }

  get lastRun(): CoordinatorRunStats {
    return { ...this._lastRun };
  }

  /**
   * Ejecuta el worker sobre cada tarea y devuelve un resultado por tarea, en orden de envío.
   * Las tareas deben llegar en `pending` o `paused`.
   */
  async run(
    tasks: readonly TransferTask[],
    worker: TaskWorker,
    options: CoordinatorRunOptions = {}
  ): Promise<TaskResult[]> {
    const slots = new ConcurrencyController({
      maxConcurrent: options.maxConcurrency ?? this.defaultMaxConcurrency,
    });
    const batchAbort = new AbortController();
    const onCallerAbort = (): void => batchAbort.abort();
    if (options.signal?.aborted) batchAbort.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const results = new Map<TransferTask, TaskResult>();
    const running = new Set<Promise<void>>();
    // Se asigna desde los callbacks de los workers
    const halt: { reason: string | null } = { reason: null };

    log.info(`Lote de ${tasks.length} tareas (concurrencia máx. ${slots.maxConcurrent})`);

    try {
      for (const task of dispatchOrder(tasks)) {
        const acquired = await slots.acquire(batchAbort.signal);
        if (!acquired) break;

        if (task.status === TaskStatus.PAUSED) transitionTask(task, TaskStatus.PENDING);
        transitionTask(task, TaskStatus.IN_FLIGHT);

        const execution: Promise<void> = this.execute(task, worker, batchAbort.signal)
          .then(result => {
            results.set(task, result);
            transitionTask(task, result.status);
            if (result.status === 'failed' && result.haltsBatch && !batchAbort.signal.aborted) {
              halt.reason = result.reason;
              log.error(`Error fatal en ${task.identifier}, abortando lote: ${result.reason}`);
              batchAbort.abort();
            }
          })
          .finally(() => {
            slots.release();
            running.delete(execution);
          });
        running.add(execution);
      }

      await Promise.all([...running]);
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    const notStartedReason = halt.reason !== null ? TASK_ERRORS.BATCH_ABORTED : TASK_ERRORS.CANCELLED;
    let notStarted = 0;
    for (const task of tasks) {
      if (results.has(task)) continue;
      if (task.status === TaskStatus.PENDING) transitionTask(task, TaskStatus.PAUSED);
      results.set(task, notStartedResult(task, notStartedReason));
      notStarted++;
    }
    if (notStarted > 0) {
      log.warn(`${notStarted} tareas sin despachar: ${notStartedReason}`);
    }

    this._lastRun = {
      peakInFlight: slots.getPeak(),
      aborted: batchAbort.signal.aborted,
      haltReason: halt.reason,
    };

    return tasks.map(task => results.get(task) ?? notStartedResult(task, notStartedReason));
  }

  private async execute(task: TransferTask, worker: TaskWorker, signal: AbortSignal): Promise<TaskResult> {
    try {
      return await worker(task, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`${TASK_ERRORS.WORKER_CRASHED} (${task.identifier}):`, error);
      return {
        status: 'failed',
        identifier: task.identifier,
        destinationPath: task.destinationPath,
        bytesTransferred: task.bytesTransferred,
        attempts: task.attemptCount,
        mirror: task.lastMirrorTried,
        category: 'Fatal',
        reason: `${TASK_ERRORS.WORKER_CRASHED}: ${message}`,
        haltsBatch: false,
      };
    }
  }
}
