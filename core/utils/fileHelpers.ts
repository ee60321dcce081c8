/**
 * @fileoverview Utilidades para operaciones con archivos: inspección de tamaños,
 * borrado tolerante a ENOENT, rutas de archivos parciales y JSON en disco.
 * @module fileHelpers
 */

import { promises as fsPromises } from 'fs';
import path from 'path';
import { logger } from './logger';

const log = logger.child('FileUtils');

/** Sin `instanceof Error`: los errores de fs pueden venir de otro contexto vm. */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/** Ruta del archivo parcial asociado a un destino. */
export function partialPathFor(destinationPath: string, suffix = '.part'): string {
  return `${destinationPath}${suffix}`;
}

/**
 * Tamaño de un archivo regular, o null si no existe (también si un componente
 * de la ruta no es un directorio). Otros errores (permisos, E/S) se propagan.
 */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fsPromises.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isNotFoundError(error) || (isErrnoException(error) && error.code === 'ENOTDIR')) return null;
    throw error;
  }
}

/** Borra un archivo; devuelve false si no existía. */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

export interface PartialFileInfo {
  destinationPath: string;
  partialPath: string;
  /** Tamaño del destino final si existe. */
  finalSize: number | null;
  /** Tamaño del .part si existe. */
  partialSize: number | null;
}

/** Estado en disco de un destino: archivo final y/o parcial. */
export async function inspectDestination(
  destinationPath: string,
  suffix = '.part'
): Promise<PartialFileInfo> {
  const partialPath = partialPathFor(destinationPath, suffix);
  const [finalSize, partialSize] = await Promise.all([
    getFileSize(destinationPath),
    getFileSize(partialPath),
  ]);
  return { destinationPath, partialPath, finalSize, partialSize };
}

/** Lee y parsea un JSON; null si el archivo no existe. */
export async function readJSONFile(filePath: string): Promise<unknown> {
  try {
    const data = await fsPromises.readFile(filePath, 'utf8');
    return JSON.parse(data);
  } catch (error) {
    if (isNotFoundError(error)) return null;
    log.error(`Error leyendo ${filePath}:`, error);
    throw error;
  }
}

/** Escribe JSON de forma atómica (archivo temporal + rename). */
export async function writeJSONFile(filePath: string, data: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  await fsPromises.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf8');
  await fsPromises.rename(tmpPath, filePath);
}

export function formatBytes(bytes: number | null | undefined): string {
  if (bytes == null || !Number.isFinite(bytes) || bytes < 0) return '?';
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(value >= 100 ? 0 : value >= 10 ? 1 : 2)} ${units[unit]}`;
}
