/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 *
 * httpRequest y shutdown se consumen por ruta directa (TransferEngine,
 * MirrorHealthChecker, punto de entrada).
 */

export {
  logger,
  configureLogger,
  createScopedLogger,
  getLogFilePath,
  getLogDirectory,
  cleanOldLogs,
  formatObject,
} from './logger';
export type { ScopedLogger, LogLevel } from './logger';

export * from './fileHelpers';
export * from './validation';

export * as schemas from './schemas';
export { UsageWindow } from './usageWindow';
export type { Clock } from './usageWindow';
