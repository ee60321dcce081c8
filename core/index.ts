/**
 * Punto de entrada de la librería.
 *
 * createMirrorDownloader arranca el motor completo: configuración por capas, logger,
 * store SQLite, registro (sembrado desde resources/mirrors.json si está vacío) y
 * orquestador.
 *
 * @module mirrorfetch
 */

import { loadConfig } from './config';
import type { AppConfig, LoadConfigOptions } from './config';
import { cleanOldLogs, configureLogger, logger } from './utils/logger';
import { REGISTRY_ERRORS } from './constants/errors';
import { EventBus } from './engines/EventBus';
import { FailureClassifier } from './engines/FailureClassifier';
import { MirrorDownloader } from './engines/MirrorDownloader';
import { MirrorHealthChecker } from './engines/MirrorHealthChecker';
import { MirrorRegistry } from './engines/MirrorRegistry';
import { MirrorSelector } from './engines/MirrorSelector';
import { MirrorStore } from './engines/MirrorStore';
import { ConcurrencyCoordinator } from './engines/ConcurrencyCoordinator';
import { TransferEngine } from './engines/TransferEngine';
import type { CatalogProvider } from './engines/types';

const log = logger.child('Init');

export interface CreateMirrorDownloaderOptions extends LoadConfigOptions {
  catalog?: CatalogProvider | null;
  /** Fuente aleatoria del selector (tests reproducibles). */
  random?: () => number;
  /** false para no escribir mirrorfetch.log. */
  fileLogging?: boolean;
}

export interface MirrorfetchContext {
  config: AppConfig;
  downloader: MirrorDownloader;
}

/**
 * Construye el motor completo. Lanza Error si la configuración no es válida o el
 * store no se puede abrir.
 */
export async function createMirrorDownloader(
  options: CreateMirrorDownloaderOptions = {}
): Promise<MirrorfetchContext> {
  const config = loadConfig(options);

  configureLogger({
    logDirectory: options.fileLogging === false ? undefined : config.paths.logDirectory,
    fileLevel: config.logging.fileLevel,
    consoleLevel: config.logging.consoleLevel,
    maxSize: config.logging.maxSize,
  });
  if (options.fileLogging !== false) {
    const removed = await cleanOldLogs(config.logging.retentionDays);
    if (removed > 0) log.info(`${removed} logs antiguos eliminados`);
  }

  const store = new MirrorStore(config.paths.dbPath);
  if (!store.initialize()) {
    throw new Error(`${REGISTRY_ERRORS.STORE_NOT_INITIALIZED}: ${config.paths.dbPath}`);
  }

  const events = new EventBus({ progressThrottleMs: config.downloads.progressThrottleMs });
  const registry = new MirrorRegistry({ store, settings: config.mirrors, events });

  try {
    if (registry.load() === 0) {
      const seeded = await registry.importFromFile(config.paths.seedMirrorsPath);
      log.info(`Registro sembrado desde ${config.paths.seedMirrorsPath}: ${seeded.added} mirrors`);
      registry.persist();
    }
  } catch (error) {
    store.close();
    throw error;
  }

  const downloader = new MirrorDownloader({
    registry,
    store,
    events,
    catalog: options.catalog ?? null,
    settings: config.downloads,
    selector: new MirrorSelector(registry, { settings: config.selection, random: options.random }),
    engine: new TransferEngine({
      network: config.network,
      partialSuffix: config.downloads.partialSuffix,
      writeHighWaterMark: config.downloads.writeHighWaterMark,
    }),
    classifier: new FailureClassifier(registry, {
      downloads: config.downloads,
      retryProfiles: config.retryProfiles,
    }),
    coordinator: new ConcurrencyCoordinator(config.downloads.maxConcurrency),
    healthChecker: new MirrorHealthChecker(registry, {
      timeoutMs: config.mirrors.healthCheckTimeoutMs,
      network: config.network,
    }),
  });

  return { config, downloader };
}

export { loadConfig, createDefaultConfig, applyOverrides } from './config';
export type { AppConfig, LoadConfigOptions, RetryProfile, RetryProfileName, FailureSeverity } from './config';
export * from './engines';
export { installShutdownHandler } from './utils/shutdown';
export type { ShutdownHandlerOptions, ShutdownSignal } from './utils/shutdown';
export { logger, configureLogger } from './utils';
export * as utils from './utils';
export type { DownloadRequestInput, MirrorSeedInput } from './utils/schemas';
