/**
 * @fileoverview Sistema de logging centralizado (electron-log en modo Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos, operaciones cronometradas
 * y limpieza de archivos antiguos. El transport de archivo queda desactivado hasta
 * que se llama a configureLogger con un directorio.
 */

import log from 'electron-log/node';
import path from 'path';
import { promises as fs } from 'fs';
import type { LogLevel } from '../config.d';

export type { LogLevel };

export interface ConfigureLoggerOptions {
  /** Directorio donde escribir mirrorfetch.log; sin él no hay log a archivo. */
  logDirectory?: string;
  fileLevel?: LogLevel;
  consoleLevel?: LogLevel;
  maxSize?: number;
}

const isTestRun = process.env.NODE_ENV === 'test';

log.transports.file.level = false;
log.transports.console.level = isTestRun ? 'error' : 'info';
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 *
 * @param obj - Cualquier valor.
 * @returns Representación en string para logs.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

type LogMethod = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  log: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  object: (_label: string, _obj: unknown) => void;
  separator: (_title?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogMethod) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    silly: logMethod('silly'),
    log: logMethod('info'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    object(label: string, obj: unknown) {
      baseChildLog.info(`${label}:\n${formatObject(obj)}`);
    },
    separator(title = '') {
      if (title) {
        baseChildLog.info(`${'='.repeat(20)} ${title} ${'='.repeat(20)}`);
      } else {
        baseChildLog.info('='.repeat(50));
      }
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

let logDirectory: string | null = null;

/**
 * Configura el logger global (archivo y consola).
 * Por defecto: fileLevel 'info', consoleLevel 'info', maxSize 10 MB.
 * Durante los tests la consola se mantiene en 'error'.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    logDirectory: directory,
    fileLevel = 'info',
    consoleLevel = 'info',
    maxSize = 10 * 1024 * 1024,
  } = options;

  if (directory) {
    logDirectory = directory;
    log.transports.file.level = fileLevel;
    log.transports.file.maxSize = maxSize;
    log.transports.file.resolvePathFn = () => path.join(directory, 'mirrorfetch.log');
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  }

  log.transports.console.level = isTestRun ? 'error' : consoleLevel;

  log.errorHandler.startCatching({
    showDialog: false,
    onError: ({ error }) => {
      log.error('Error no capturado:', error);
    },
  });

  log.info('='.repeat(50));
  log.info('Logger inicializado');
  log.info(`Archivo de log: ${getLogFilePath() ?? 'desactivado'}`);
  log.info('='.repeat(50));
}

/** Ruta absoluta del archivo de log actual, o null si no está configurado. */
export function getLogFilePath(): string | null {
  return logDirectory ? path.join(logDirectory, 'mirrorfetch.log') : null;
}

/** Directorio donde se escriben los archivos de log, o null. */
export function getLogDirectory(): string | null {
  return logDirectory;
}

/**
 * Elimina archivos .log del directorio de logs cuya fecha de modificación
 * sea anterior a daysToKeep días.
 * @param daysToKeep - Días a conservar (por defecto 30)
 * @returns Número de archivos eliminados.
 */
export async function cleanOldLogs(daysToKeep = 30): Promise<number> {
  const logDir = getLogDirectory();
  if (!logDir) {
    log.warn('No se pudo obtener el directorio de logs');
    return 0;
  }
  let removed = 0;
  try {
    const files = await fs.readdir(logDir);
    const now = Date.now();
    const maxAge = daysToKeep * 24 * 60 * 60 * 1000;
    for (const file of files) {
      if (!file.endsWith('.log')) continue;
      const filePath = path.join(logDir, file);
      const stats = await fs.stat(filePath);
      if (now - stats.mtime.getTime() > maxAge) {
        await fs.unlink(filePath);
        removed++;
        log.info(`Log antiguo eliminado: ${file}`);
      }
    }
  } catch (error) {
    log.error('Error limpiando logs antiguos:', error);
  }
  return removed;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  startOperation: (_operation: string) => (_result?: string) => void;
  getFilePath: typeof getLogFilePath;
  getDirectory: typeof getLogDirectory;
  cleanOldLogs: typeof cleanOldLogs;
  configure: typeof configureLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  startOperation(operation: string) {
    const start = Date.now();
    log.info(`▶ Iniciando: ${operation}`);
    return (result = 'completado') => {
      const duration = Date.now() - start;
      log.info(`✓ ${operation}: ${result} (${duration}ms)`);
    };
  },
  getFilePath: getLogFilePath,
  getDirectory: getLogDirectory,
  cleanOldLogs,
  configure: configureLogger,
};
