/**
 * Orquestador del motor: resuelve las peticiones, construye las tareas y ejecuta el bucle
 * de intentos de cada una (selección de mirror → transferencia → clasificación) bajo el
 * ConcurrencyCoordinator.
 *
 * Flujo por tarea:
 * 1. El selector elige un mirror entre los elegibles (excluyendo los ya descartados).
 * 2. TransferEngine transfiere `${baseUrl}/${canonicalPath}` reanudando desde `.part`.
 * 3. FailureClassifier decide y actualiza el registro; el bucle reintenta en el mismo
 *    mirror, cambia de mirror, pausa o termina.
 *
 * El estado de pausa vive solo en disco: volver a llamar a downloadBatch (o resume) con el
 * mismo identificador y destino continúa desde el parcial.
 *
 * @module MirrorDownloader
 */

import path from 'path';
import config from '../config';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import { getFileSize, partialPathFor } from '../utils/fileHelpers';
import { buildMirrorUrl, normalizeCanonicalPath } from '../utils/validation';
import { validateDownloadRequest } from '../utils/schemas';
import type { DownloadRequest, DownloadRequestInput, MirrorSeedInput } from '../utils/schemas';
import { TASK_ERRORS } from '../constants/errors';
import { VALIDATIONS } from '../constants/validations';
import { ConcurrencyCoordinator } from './ConcurrencyCoordinator';
import { EventBus } from './EventBus';
import { FailureClassifier, exhaustedDecision } from './FailureClassifier';
import { MirrorHealthChecker } from './MirrorHealthChecker';
import type { MirrorCheckResult } from './MirrorHealthChecker';
import type { MirrorRegistry, RefreshResult } from './MirrorRegistry';
import { MirrorSelector } from './MirrorSelector';
import type { MirrorStore } from './MirrorStore';
import { SpeedTracker } from './SpeedTracker';
import { TransferEngine } from './TransferEngine';
import { TaskStatus } from './types';
import type {
  BatchResult,
  BatchSummary,
  CatalogEntry,
  CatalogProvider,
  ErrorCategory,
  MirrorSite,
  TaskResult,
  TransferOutcome,
  TransferProgress,
  TransferTask,
} from './types';

const log = logger.child('MirrorDownloader');

export type DownloadSettings = AppConfig['downloads'];

export interface MirrorDownloaderOptions {
  registry: MirrorRegistry;
  /** Si se pasa, close() persiste el registro y cierra el store. */
  store?: MirrorStore | null;
  catalog?: CatalogProvider | null;
  events?: EventBus;
  selector?: MirrorSelector;
  engine?: TransferEngine;
  classifier?: FailureClassifier;
  coordinator?: ConcurrencyCoordinator;
  healthChecker?: MirrorHealthChecker;
  settings?: Partial<DownloadSettings>;
  /** Espera entre reintentos; inyectable para tests. */
  sleep?: (_ms: number, _signal: AbortSignal) => Promise<void>;
}

export interface BatchOptions {
  maxConcurrency?: number;
  signal?: AbortSignal;
}

export interface PausedTaskInfo {
  identifier: string;
  destinationPath: string;
  partialPath: string;
  bytesOnDisk: number;
}

interface ResolvedRequest {
  request: DownloadRequest;
  entry: CatalogEntry | null;
  /** Motivo si no se pudo resolver la ruta canónica. */
  failure: string | null;
}

/** Espera `ms` o hasta que la señal se aborte (sin rechazar). */
export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise<void>(resolve => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Resume estadístico de un lote a partir de sus resultados. */
export function summarizeBatch(
  results: readonly TaskResult[],
  stats: { peakInFlight: number; durationMs: number; aborted: boolean }
): BatchSummary {
  const summary: BatchSummary = {
    total: results.length,
    completed: 0,
    skipped: 0,
    paused: 0,
    failed: 0,
    bytesTransferred: 0,
    peakInFlight: stats.peakInFlight,
    durationMs: stats.durationMs,
    aborted: stats.aborted,
  };
  for (const result of results) {
    summary.bytesTransferred += result.bytesTransferred;
    if (result.status === 'completed') {
      summary.completed++;
      if (result.skipped) summary.skipped++;
    } else if (result.status === 'paused') {
      summary.paused++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}

export class MirrorDownloader {
  readonly registry: MirrorRegistry;
  readonly events: EventBus;
  readonly selector: MirrorSelector;
  private readonly store: MirrorStore | null;
  private readonly catalog: CatalogProvider | null;
  private readonly engine: TransferEngine;
  private readonly classifier: FailureClassifier;
  private readonly coordinator: ConcurrencyCoordinator;
  private readonly healthChecker: MirrorHealthChecker;
  private readonly settings: DownloadSettings;
  private readonly sleep: (_ms: number, _signal: AbortSignal) => Promise<void>;
  private readonly speed = new SpeedTracker();
  private closed = false;

  constructor(options: MirrorDownloaderOptions) {
    this.registry = options.registry;
    this.store = options.store ?? null;
    this.catalog = options.catalog ?? null;
    this.settings = { ...config.downloads, ...options.settings };
    this.events = options.events ?? new EventBus({ progressThrottleMs: this.settings.progressThrottleMs });
    this.selector = options.selector ?? new MirrorSelector(this.registry);
    this.engine =
      options.engine ??
      new TransferEngine({
        partialSuffix: this.settings.partialSuffix,
        writeHighWaterMark: this.settings.writeHighWaterMark,
      });
    this.classifier = options.classifier ?? new FailureClassifier(this.registry, { downloads: this.settings });
    this.coordinator = options.coordinator ?? new ConcurrencyCoordinator(this.settings.maxConcurrency);
    this.healthChecker = options.healthChecker ?? new MirrorHealthChecker(this.registry);
    this.sleep = options.sleep ?? abortableDelay;
  }

  // ---------------------------------------------------------------------------
  // API pública
  // ---------------------------------------------------------------------------

  /**
   * Descarga un lote de (identificador → destino). Nunca rechaza por fallos de
   * transferencia: cada petición acaba como completed, paused o failed.
   * Lanza Error si alguna petición no supera la validación.
   */
  async downloadBatch(requests: readonly DownloadRequestInput[], options: BatchOptions = {}): Promise<BatchResult> {
    const startedAt = Date.now();
    const validated = this.validateRequests(requests);
    this.registry.pruneExpiredAvailability();
    this.selector.pruneRecency();
    const maxConcurrency = Math.min(
      options.maxConcurrency ?? this.settings.maxConcurrency,
      this.settings.maxConcurrencyLimit
    );

    const resolved = await Promise.all(validated.map(request => this.resolveRequest(request)));

    const results: Array<TaskResult | null> = resolved.map(({ request, failure }) =>
      failure === null ? null : this.unresolvedResult(request, failure)
    );

    const tasks: TransferTask[] = [];
    const taskSlots: number[] = [];
    for (let index = 0; index < resolved.length; index++) {
      const { request, entry, failure } = resolved[index];
      if (failure !== null || entry === null) continue;
      tasks.push(await this.buildTask(request, entry, index));
      taskSlots.push(index);
    }

    const taskResults = await this.coordinator.run(tasks, (task, signal) => this.runTask(task, signal), {
      maxConcurrency,
      signal: options.signal,
    });
    taskResults.forEach((result, i) => {
      results[taskSlots[i]] = result;
    });

    const finalResults = results.map(
      (result, index) => result ?? this.unresolvedResult(validated[index], TASK_ERRORS.UNRESOLVED)
    );
    const runStats = this.coordinator.lastRun;
    const summary = summarizeBatch(finalResults, {
      peakInFlight: runStats.peakInFlight,
      durationMs: Date.now() - startedAt,
      aborted: runStats.aborted,
    });

    log.info(
      `Lote terminado: ${summary.completed} completadas (${summary.skipped} ya en disco), ` +
        `${summary.paused} pausadas, ${summary.failed} fallidas en ${summary.durationMs}ms`
    );
    this.events.emitBatchCompleted(summary);
    return { results: finalResults, summary };
  }

  /** Reanuda solo las peticiones con archivo parcial en disco. */
  async resume(requests: readonly DownloadRequestInput[], options: BatchOptions = {}): Promise<BatchResult> {
    const paused = await this.findPausedTasks(requests);
    const pausedKeys = new Set(paused.map(p => `${p.identifier}\u0000${p.destinationPath}`));
    const toResume = this.validateRequests(requests).filter(r =>
      pausedKeys.has(`${r.identifier}\u0000${r.destinationPath}`)
    );
    log.info(`Reanudando ${toResume.length} de ${requests.length} peticiones`);
    return this.downloadBatch(toResume, options);
  }

  /** Peticiones con `.part` no vacío en disco; el sistema de archivos es la única fuente. */
  async findPausedTasks(requests: readonly DownloadRequestInput[]): Promise<PausedTaskInfo[]> {
    const found: PausedTaskInfo[] = [];
    for (const request of this.validateRequests(requests)) {
      const partialPath = partialPathFor(request.destinationPath, this.settings.partialSuffix);
      const size = await getFileSize(partialPath);
      if (size !== null && size > 0) {
        found.push({
          identifier: request.identifier,
          destinationPath: request.destinationPath,
          partialPath,
          bytesOnDisk: size,
        });
      }
    }
    return found;
  }

  /** Sondea todos los mirrors y devuelve el resultado por mirror. */
  async checkMirrors(signal?: AbortSignal): Promise<MirrorCheckResult[]> {
    const results = await this.healthChecker.checkAll(signal);
    this.persistRegistry();
    return results;
  }

  /** Aplica una lista de mirrors conservando la salud aprendida. */
  refreshMirrors(seeds: readonly MirrorSeedInput[]): RefreshResult {
    const result = this.registry.refresh(seeds);
    this.persistRegistry();
    return result;
  }

  /** Persiste el registro, libera sockets y cierra el store. Idempotente. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.persistRegistry();
    this.engine.close();
    this.healthChecker.close();
    this.speed.clear();
    this.store?.close();
  }

  // ---------------------------------------------------------------------------
  // Preparación del lote
  // ---------------------------------------------------------------------------

  private validateRequests(requests: readonly DownloadRequestInput[]): DownloadRequest[] {
    return requests.map((input, index) => {
      const validation = validateDownloadRequest(input);
      if (!validation.success || !validation.data) {
        throw new Error(`${VALIDATIONS.REQUEST.INVALID} [${index}]: ${validation.error ?? ''}`);
      }
      return validation.data;
    });
  }

  private async resolveRequest(request: DownloadRequest): Promise<ResolvedRequest> {
    if (request.canonicalPath) {
      return {
        request,
        entry: { canonicalPath: request.canonicalPath, expectedSize: request.expectedSize ?? null },
        failure: null,
      };
    }
    if (!this.catalog) {
      return { request, entry: null, failure: TASK_ERRORS.UNRESOLVED };
    }

    try {
      const entry = await this.catalog.resolve(request.identifier);
      if (!entry || normalizeCanonicalPath(entry.canonicalPath) === '') {
        return { request, entry: null, failure: TASK_ERRORS.UNRESOLVED };
      }
      if (entry.availability?.length) {
        const now = Date.now();
        this.registry.importAvailability(
          entry.availability.map(a => ({
            mirror: a.mirror,
            identifier: request.identifier,
            state: a.state,
            verifiedAt: a.verifiedAt ?? now,
          }))
        );
      }
      return { request, entry, failure: null };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`El catálogo falló resolviendo ${request.identifier}: ${message}`);
      return { request, entry: null, failure: `${TASK_ERRORS.UNRESOLVED}: ${message}` };
    }
  }

  private unresolvedResult(request: DownloadRequest, reason: string): TaskResult {
    return {
      status: 'failed',
      identifier: request.identifier,
      destinationPath: request.destinationPath,
      bytesTransferred: 0,
      attempts: 0,
      mirror: null,
      category: 'NotFound',
      reason,
      haltsBatch: false,
    };
  }

  private async buildTask(request: DownloadRequest, entry: CatalogEntry, index: number): Promise<TransferTask> {
    const partialSize =
      (await getFileSize(partialPathFor(request.destinationPath, this.settings.partialSuffix))) ?? 0;
    return {
      identifier: request.identifier,
      destinationPath: request.destinationPath,
      canonicalPath: normalizeCanonicalPath(entry.canonicalPath),
      expectedSize: request.expectedSize ?? entry.expectedSize ?? null,
      bytesTransferred: partialSize,
      status: partialSize > 0 ? TaskStatus.PAUSED : TaskStatus.PENDING,
      attemptCount: 0,
      lastMirrorTried: null,
      priority: request.priority,
      submissionIndex: index,
      candidateMirrors: entry.candidateMirrors?.length ? [...entry.candidateMirrors] : null,
    };
  }

  // ---------------------------------------------------------------------------
  // Bucle de intentos
  // ---------------------------------------------------------------------------

  private async runTask(task: TransferTask, signal: AbortSignal): Promise<TaskResult> {
    const excluded = new Set<string>();
    let current: MirrorSite | null = null;
    let sameMirrorRetries = 0;
    let lastFailure: { category: ErrorCategory; reason: string } | null = null;

    this.events.emitTaskStarted(task.identifier, task.destinationPath, task.bytesTransferred);
    this.speed.startTracking(task.identifier, task.bytesTransferred);

    try {
      for (;;) {
        if (signal.aborted) {
          return this.pausedResult(task, 'cancelled');
        }

        if (current === null) {
          current = this.selector.select(task.identifier, task.candidateMirrors, excluded);
          sameMirrorRetries = 0;
          if (current === null) {
            const decision = exhaustedDecision(
              lastFailure ? `${TASK_ERRORS.EXHAUSTED} (último error: ${lastFailure.reason})` : TASK_ERRORS.EXHAUSTED
            );
            return this.failedResult(task, decision.category, decision.reason, decision.scope === 'batch');
          }
        }

        const mirror: MirrorSite = current;
        task.attemptCount++;
        task.lastMirrorTried = mirror.name;
        const url = buildMirrorUrl(mirror.baseUrl, task.canonicalPath);
        this.events.emitMirrorSelected(task.identifier, mirror.name, task.attemptCount, url);
        log.debug(`Intento ${task.attemptCount} de ${task.identifier} en ${mirror.name}`);

        const outcome: TransferOutcome = await this.engine.transfer({
          url,
          destinationPath: task.destinationPath,
          expectedSize: task.expectedSize,
          signal,
          onProgress: progress => this.reportProgress(task, mirror.name, progress),
        });
        task.bytesTransferred = outcome.bytesTransferred;

        const decision = this.classifier.apply(mirror.name, task.identifier, outcome, {
          sameMirrorRetries,
          attempt: task.attemptCount,
        });

        switch (decision.action) {
          case 'complete':
            return this.completedResult(task, outcome.status === 'completed' && outcome.skipped);

          case 'fatal':
            return this.failedResult(task, decision.category, decision.reason, decision.scope === 'batch');

          case 'pause-for-resume':
            if (!decision.retry) {
              return this.pausedResult(task, decision.reason);
            }
            lastFailure = { category: decision.category, reason: decision.reason };
            // El parcial sirve para cualquier mirror; se insiste en el mismo mientras se pueda
            if (sameMirrorRetries < this.settings.maxSameMirrorRetries) {
              sameMirrorRetries++;
            } else {
              excluded.add(mirror.name);
              current = null;
            }
            await this.sleep(decision.delayMs, signal);
            break;

          case 'retry-same-mirror':
            lastFailure = { category: decision.category, reason: decision.reason };
            sameMirrorRetries++;
            await this.sleep(decision.delayMs, signal);
            break;

          case 'retry-different-mirror':
            lastFailure = { category: decision.category, reason: decision.reason };
            excluded.add(mirror.name);
            current = null;
            await this.sleep(decision.delayMs, signal);
            break;
        }
      }
    } finally {
      this.speed.stopTracking(task.identifier);
    }
  }

  private reportProgress(task: TransferTask, mirror: string, progress: TransferProgress): void {
    task.bytesTransferred = progress.bytesTransferred;
    const speed = this.speed.update(task.identifier, progress.bytesTransferred, progress.totalBytes);
    const done = progress.totalBytes !== null && progress.bytesTransferred >= progress.totalBytes;
    this.events.emitTaskProgress(
      {
        identifier: task.identifier,
        mirror,
        bytesTransferred: progress.bytesTransferred,
        totalBytes: progress.totalBytes,
        percent:
          progress.totalBytes !== null && progress.totalBytes > 0
            ? Math.min(100, (progress.bytesTransferred / progress.totalBytes) * 100)
            : null,
        speedBytesPerSec: speed?.speedBytesPerSec ?? 0,
        remainingTime: speed?.remainingTime ?? null,
      },
      done
    );
  }

  private completedResult(task: TransferTask, skipped: boolean): TaskResult {
    this.events.emitTaskCompleted(task.identifier, task.destinationPath, task.bytesTransferred, skipped);
    if (!skipped) {
      log.info(`${task.identifier} completado en ${task.lastMirrorTried ?? '?'} → ${path.basename(task.destinationPath)}`);
    }
    return {
      status: 'completed',
      identifier: task.identifier,
      destinationPath: task.destinationPath,
      bytesTransferred: task.bytesTransferred,
      attempts: task.attemptCount,
      mirror: task.lastMirrorTried,
      skipped,
    };
  }

  private pausedResult(task: TransferTask, reason: string): TaskResult {
    this.events.emitTaskPaused(task.identifier, task.bytesTransferred, reason);
    log.info(`${task.identifier} pausado con ${task.bytesTransferred} bytes en disco (${reason})`);
    return {
      status: 'paused',
      identifier: task.identifier,
      destinationPath: task.destinationPath,
      bytesTransferred: task.bytesTransferred,
      attempts: task.attemptCount,
      mirror: task.lastMirrorTried,
      started: true,
      reason,
    };
  }

  private failedResult(task: TransferTask, category: ErrorCategory, reason: string, haltsBatch: boolean): TaskResult {
    this.events.emitTaskFailed(task.identifier, category, reason);
    log.warn(`${task.identifier} fallido [${category}]: ${reason}`);
    return {
      status: 'failed',
      identifier: task.identifier,
      destinationPath: task.destinationPath,
      bytesTransferred: task.bytesTransferred,
      attempts: task.attemptCount,
      mirror: task.lastMirrorTried,
      category,
      reason,
      haltsBatch,
    };
  }

  private persistRegistry(): void {
    if (!this.store?.isInitialized) return;
    try {
      this.registry.persist();
    } catch (error) {
      log.error('Error persistiendo el registro de mirrors:', error);
    }
  }
}
