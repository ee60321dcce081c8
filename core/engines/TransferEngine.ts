/**
 * Transferencia en un solo stream con reanudación por HTTP Range.
 *
 * transfer: comprueba si el destino ya está completo (sin petición), reanuda desde el
 * archivo `.part` con `Range: bytes=<tamaño>-` o empieza de cero truncándolo, escribe el
 * cuerpo a disco chunk a chunk con backpressure y al terminar renombra `.part` al destino.
 * Un 416 o un Content-Range que no encaja con el parcial descartan el parcial y reinician
 * una vez desde cero. El resultado es `completed`, `partial` (archivo conservado para
 * reanudar) o `failed` con un TransferError.
 *
 * @module TransferEngine
 */

import fs from 'fs';
import { promises as fsPromises } from 'fs';
import type { IncomingMessage } from 'http';
import path from 'path';
import { finished } from 'stream/promises';
import config from '../config';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import {
  ensureDirectory,
  formatBytes,
  getFileSize,
  inspectDestination,
  partialPathFor,
  removeFileIfExists,
} from '../utils/fileHelpers';
import { hostOf, isValidUrl } from '../utils/validation';
import {
  cancelledError,
  createAgents,
  destroyAgents,
  openRequest,
  toNetworkError,
} from '../utils/httpRequest';
import type { HttpAgents } from '../utils/httpRequest';
import { TRANSFER_ERRORS } from '../constants/errors';
import { TransferError, toFilesystemError } from './TransferError';
import { parseRetryAfter } from './RetryPolicy';
import type { ProgressObserver, TransferOutcome } from './types';

const log = logger.child('TransferEngine');

export interface TransferRequest {
  url: string;
  destinationPath: string;
  /** Tamaño esperado según el catálogo; null si se desconoce. */
  expectedSize?: number | null;
  signal?: AbortSignal;
  onProgress?: ProgressObserver;
}

export interface TransferEngineOptions {
  network?: Partial<AppConfig['network']>;
  partialSuffix?: string;
  writeHighWaterMark?: number;
  /** Agentes compartidos; si no se pasan el motor crea los suyos y los cierra en close(). */
  agents?: HttpAgents;
}

interface ContentRange {
  start: number;
  end: number;
  total: number | null;
}

interface PumpResult {
  received: number;
  overflow: boolean;
  networkError: unknown;
  fileError: Error | null;
}

/** Parsea `bytes 100-499/500` (o `bytes 100-499/*`). */
export function parseContentRange(header: string | undefined): ContentRange | null {
  if (!header) return null;
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) return null;
  return {
    start: Number(match[1]),
    end: Number(match[2]),
    total: match[3] === '*' ? null : Number(match[3]),
  };
}

/** Total anunciado en un 416: `bytes *\/500`. */
function parseUnsatisfiedRange(header: string | undefined): number | null {
  if (!header) return null;
  const match = /^bytes\s+\*\/(\d+)$/i.exec(header.trim());
  return match ? Number(match[1]) : null;
}

function parseContentLength(header: string | undefined): number | null {
  if (!header || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim());
}

/**
 * Copia el cuerpo al archivo con pause/resume según 'drain'. Resuelve (nunca rechaza)
 * cuando el cuerpo termina, falla la red o falla la escritura.
 */
function pumpToFile(
  response: IncomingMessage,
  fileStream: fs.WriteStream,
  startByte: number,
  expectedSize: number | null,
  onChunk: (_bytesTransferred: number, _chunkBytes: number) => void
): Promise<PumpResult> {
  return new Promise<PumpResult>(resolve => {
    let received = 0;
    let settled = false;

    const finish = (patch: Partial<PumpResult>): void => {
      if (settled) return;
      settled = true;
      response.off('data', onData);
      response.off('end', onEnd);
      response.off('error', onResponseError);
      response.off('close', onClose);
      fileStream.off('error', onFileError);
      resolve({ received, overflow: false, networkError: null, fileError: null, ...patch });
    };

    const onData = (chunk: Buffer): void => {
      if (expectedSize !== null && startByte + received + chunk.length > expectedSize) {
        response.destroy();
        finish({ overflow: true });
        return;
      }
      received += chunk.length;
      const canContinue = fileStream.write(chunk);
      onChunk(startByte + received, chunk.length);
      if (!canContinue) {
        response.pause();
        fileStream.once('drain', () => {
          if (!response.destroyed) response.resume();
        });
      }
    };
    const onEnd = (): void => finish({});
    const onResponseError = (error: Error): void => finish({ networkError: error });
    const onClose = (): void => {
      // Cierre sin 'end': conexión cortada a mitad del cuerpo
      if (!response.complete) {
        finish({ networkError: new TransferError('connection', TRANSFER_ERRORS.STREAM_INTERRUPTED) });
      }
    };
    const onFileError = (error: Error): void => {
      response.destroy();
      finish({ fileError: error });
    };

    response.on('data', onData);
    response.on('end', onEnd);
    response.on('error', onResponseError);
    response.on('close', onClose);
    fileStream.on('error', onFileError);
  });
}

/** Cierra el archivo vaciando el buffer; devuelve el error de escritura tal cual, o null. */
async function closeFile(fileStream: fs.WriteStream): Promise<unknown> {
  if (fileStream.destroyed) return null;
  fileStream.end();
  try {
    await finished(fileStream);
    return null;
  } catch (error) {
    return error ?? new Error(TRANSFER_ERRORS.FILESYSTEM);
  }
}

function openFileStream(filePath: string, append: boolean, highWaterMark: number): Promise<fs.WriteStream> {
  return new Promise<fs.WriteStream>((resolve, reject) => {
    const stream = fs.createWriteStream(filePath, { flags: append ? 'a' : 'w', highWaterMark });
    const onError = (error: Error): void => {
      stream.off('open', onOpen);
      reject(error);
    };
    const onOpen = (): void => {
      stream.off('error', onError);
      resolve(stream);
    };
    stream.once('error', onError);
    stream.once('open', onOpen);
  });
}

export class TransferEngine {
  private readonly network: AppConfig['network'];
  private readonly partialSuffix: string;
  private readonly writeHighWaterMark: number;
  private readonly agents: HttpAgents;
  private readonly ownsAgents: boolean;

  constructor(options: TransferEngineOptions = {}) {
    this.network = { ...config.network, ...options.network };
    this.partialSuffix = options.partialSuffix ?? config.downloads.partialSuffix;
    this.writeHighWaterMark = options.writeHighWaterMark ?? config.downloads.writeHighWaterMark;
    this.ownsAgents = !options.agents;
    this.agents = options.agents ?? createAgents(this.network.maxSockets);
  }

  partialPathFor(destinationPath: string): string {
    return partialPathFor(destinationPath, this.partialSuffix);
  }

  /**
   * Ejecuta una transferencia completa contra una URL ya resuelta (mirror + ruta canónica).
   * No lanza: los fallos llegan como outcome `failed`.
   */
  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    const expectedSize = request.expectedSize ?? null;
    const partialPath = this.partialPathFor(request.destinationPath);

    if (!isValidUrl(request.url)) {
      return {
        status: 'failed',
        bytesTransferred: 0,
        bytesReceived: 0,
        error: new TransferError('invalid_request', `${TRANSFER_ERRORS.INVALID_URL}: ${request.url}`),
      };
    }

    try {
      await ensureDirectory(path.dirname(request.destinationPath));
      const onDisk = await inspectDestination(request.destinationPath, this.partialSuffix);

      if (onDisk.finalSize !== null) {
        if (expectedSize === null || onDisk.finalSize === expectedSize) {
          log.debug(`Destino ya completo, sin petición: ${request.destinationPath}`);
          return {
            status: 'completed',
            bytesTransferred: onDisk.finalSize,
            bytesReceived: 0,
            resumed: false,
            skipped: true,
          };
        }
        if (onDisk.finalSize < expectedSize && onDisk.partialSize === null) {
          await fsPromises.rename(request.destinationPath, partialPath);
          log.info(
            `Destino incompleto (${formatBytes(onDisk.finalSize)}/${formatBytes(expectedSize)}) convertido a parcial`
          );
        } else {
          await removeFileIfExists(request.destinationPath);
          log.warn(`Destino con tamaño inesperado eliminado: ${request.destinationPath}`);
        }
      }
    } catch (error) {
      return this.fsFailure(error, 'preparando destino', partialPath);
    }

    if (request.signal?.aborted) {
      return this.cancelledOutcome(partialPath, 0);
    }

    return this.attempt(request, expectedSize, partialPath, true);
  }

  private async attempt(
    request: TransferRequest,
    expectedSize: number | null,
    partialPath: string,
    canRestart: boolean
  ): Promise<TransferOutcome> {
    let partialSize: number;
    try {
      partialSize = (await getFileSize(partialPath)) ?? 0;
    } catch (error) {
      return this.fsFailure(error, 'inspeccionando parcial', partialPath);
    }

    const resumeFrom =
      partialSize > 0 && (expectedSize === null || partialSize < expectedSize) ? partialSize : 0;
    if (partialSize > 0 && resumeFrom === 0) {
      log.info(`Parcial obsoleto (${formatBytes(partialSize)}), empezando desde cero`);
    }

    const headers: Record<string, string> = {
      'User-Agent': this.network.userAgent,
      Accept: '*/*',
      'Accept-Encoding': 'identity',
    };
    if (resumeFrom > 0) {
      headers.Range = `bytes=${resumeFrom}-`;
      log.info(`Reanudando ${path.basename(request.destinationPath)} desde byte ${resumeFrom}`);
    }

    let response: IncomingMessage;
    let statusCode: number;
    try {
      const opened = await openRequest(request.url, {
        headers,
        signal: request.signal,
        connectTimeout: this.network.connectTimeout,
        responseTimeout: this.network.responseTimeout,
        idleTimeout: this.network.idleTimeout,
        maxRedirects: this.network.maxRedirects,
        agents: this.agents,
      });
      response = opened.response;
      statusCode = opened.statusCode;
    } catch (error) {
      if (request.signal?.aborted) {
        return this.cancelledOutcome(partialPath, 0);
      }
      const transferError = toNetworkError(error);
      log.warn(`Petición fallida a ${hostOf(request.url)}: ${transferError.message}`);
      return { status: 'failed', bytesTransferred: partialSize, bytesReceived: 0, error: transferError };
    }

    const headerValue = (name: string): string | undefined => {
      const value = response.headers[name];
      return Array.isArray(value) ? value[0] : value;
    };

    // --- Respuestas sin cuerpo útil ---
    if (statusCode === 416) {
      response.resume();
      const remoteTotal = parseUnsatisfiedRange(headerValue('content-range'));
      // Con tamaño esperado, resumeFrom < expectedSize: un total remoto igual al parcial es un recurso encogido
      if (expectedSize === null && resumeFrom > 0 && remoteTotal !== null && remoteTotal === resumeFrom) {
        // El parcial ya contenía el recurso completo
        return this.finalize(request, partialPath, resumeFrom, 0, true);
      }
      return this.restartOrFail(request, expectedSize, partialPath, canRestart, 'HTTP 416');
    }
    if (statusCode === 404 || statusCode === 410) {
      response.resume();
      return this.httpFailure('not_found', `${TRANSFER_ERRORS.NOT_FOUND} (HTTP ${statusCode})`, statusCode, partialSize);
    }
    if (statusCode === 429) {
      response.resume();
      const retryAfterMs =
        parseRetryAfter(headerValue('retry-after'), { maxMs: this.network.retryAfterMaxMs }) ??
        this.network.retryAfterDefaultMs;
      log.info(`429 en ${hostOf(request.url)}, reintento en ${Math.round(retryAfterMs / 1000)}s`);
      return {
        status: 'failed',
        bytesTransferred: partialSize,
        bytesReceived: 0,
        error: new TransferError('rate_limited', TRANSFER_ERRORS.RATE_LIMITED, { statusCode, retryAfterMs }),
      };
    }
    if (statusCode >= 500) {
      response.resume();
      return this.httpFailure('server_error', `${TRANSFER_ERRORS.SERVER_ERROR} (HTTP ${statusCode})`, statusCode, partialSize);
    }
    if (statusCode !== 200 && statusCode !== 206) {
      response.resume();
      return this.httpFailure('http_error', `${TRANSFER_ERRORS.HTTP_ERROR} (HTTP ${statusCode})`, statusCode, partialSize);
    }

    // --- Validación de rango / tamaño antes de escribir ---
    let startByte = 0;
    let totalBytes = expectedSize;
    const contentLength = parseContentLength(headerValue('content-length'));

    if (statusCode === 206) {
      const range = parseContentRange(headerValue('content-range'));
      const stale =
        range === null ||
        range.start !== resumeFrom ||
        (expectedSize !== null && range.total !== null && range.total !== expectedSize);
      if (stale) {
        response.destroy();
        log.warn(
          `Content-Range no coincide con el parcial (${headerValue('content-range') ?? 'ausente'}, ` +
            `esperado inicio ${resumeFrom}${expectedSize !== null ? `, total ${expectedSize}` : ''})`
        );
        return this.restartOrFail(request, expectedSize, partialPath, canRestart, 'Content-Range');
      }
      startByte = resumeFrom;
      totalBytes = expectedSize ?? range.total;
    } else {
      if (resumeFrom > 0) {
        log.info(`El servidor ignoró Range para ${hostOf(request.url)}, reescribiendo desde cero`);
      }
      if (expectedSize !== null && contentLength !== null && contentLength !== expectedSize) {
        response.destroy();
        await this.discardPartial(partialPath);
        return {
          status: 'failed',
          bytesTransferred: 0,
          bytesReceived: 0,
          error: new TransferError(
            'integrity_mismatch',
            `${TRANSFER_ERRORS.SIZE_MISMATCH}: servidor anuncia ${contentLength}, esperado ${expectedSize}`,
            { statusCode }
          ),
        };
      }
      totalBytes = expectedSize ?? contentLength;
    }

    // --- Stream a disco ---
    let fileStream: fs.WriteStream;
    try {
      fileStream = await openFileStream(partialPath, startByte > 0, this.writeHighWaterMark);
    } catch (error) {
      response.destroy();
      return this.fsFailure(error, 'abriendo parcial', partialPath);
    }

    const onAbort = (): void => {
      response.destroy(cancelledError());
    };
    request.signal?.addEventListener('abort', onAbort, { once: true });
    if (request.signal?.aborted) onAbort();

    const pump = await pumpToFile(response, fileStream, startByte, expectedSize, (bytes, chunkBytes) => {
      request.onProgress?.({ bytesTransferred: bytes, totalBytes, chunkBytes });
    });
    request.signal?.removeEventListener('abort', onAbort);

    const closeError = pump.fileError ? null : await closeFile(fileStream);
    if (pump.fileError) fileStream.destroy();
    const fileError = pump.fileError ?? closeError;

    let onDiskSize: number;
    try {
      onDiskSize = (await getFileSize(partialPath)) ?? 0;
    } catch (error) {
      return this.fsFailure(error, 'midiendo parcial', partialPath);
    }

    if (fileError) {
      return this.fsFailure(fileError, 'escribiendo parcial', partialPath, onDiskSize, pump.received);
    }

    if (pump.overflow) {
      await this.discardPartial(partialPath);
      log.warn(`${TRANSFER_ERRORS.SIZE_EXCEEDED}: ${request.url}`);
      return {
        status: 'failed',
        bytesTransferred: 0,
        bytesReceived: pump.received,
        error: new TransferError('integrity_mismatch', `${TRANSFER_ERRORS.SIZE_EXCEEDED} (esperado ${expectedSize})`),
      };
    }

    if (request.signal?.aborted) {
      return this.cancelledOutcome(partialPath, pump.received, onDiskSize);
    }

    if (pump.networkError) {
      const error = toNetworkError(pump.networkError);
      if (onDiskSize === 0) {
        return { status: 'failed', bytesTransferred: 0, bytesReceived: pump.received, error };
      }
      log.info(
        `Transferencia interrumpida en ${formatBytes(onDiskSize)}` +
          `${totalBytes !== null ? `/${formatBytes(totalBytes)}` : ''}: ${error.message}`
      );
      return {
        status: 'partial',
        bytesTransferred: onDiskSize,
        bytesReceived: pump.received,
        reason: 'interrupted',
        error,
      };
    }

    // Fin limpio del cuerpo: el tamaño tiene que cuadrar
    if (expectedSize !== null && onDiskSize !== expectedSize) {
      await this.discardPartial(partialPath);
      return {
        status: 'failed',
        bytesTransferred: 0,
        bytesReceived: pump.received,
        error: new TransferError(
          'integrity_mismatch',
          `${TRANSFER_ERRORS.SIZE_MISMATCH}: ${onDiskSize}/${expectedSize} bytes`
        ),
      };
    }

    return this.finalize(request, partialPath, onDiskSize, pump.received, startByte > 0);
  }

  private async finalize(
    request: TransferRequest,
    partialPath: string,
    size: number,
    received: number,
    resumed: boolean
  ): Promise<TransferOutcome> {
    try {
      await fsPromises.rename(partialPath, request.destinationPath);
    } catch (error) {
      return this.fsFailure(error, 'renombrando parcial', partialPath, size, received);
    }
    log.info(
      `Transferencia completada: ${path.basename(request.destinationPath)} (${formatBytes(size)}${resumed ? ', reanudada' : ''})`
    );
    return { status: 'completed', bytesTransferred: size, bytesReceived: received, resumed, skipped: false };
  }

  private async restartOrFail(
    request: TransferRequest,
    expectedSize: number | null,
    partialPath: string,
    canRestart: boolean,
    cause: string
  ): Promise<TransferOutcome> {
    const discarded = await this.discardPartial(partialPath);
    if (discarded) return discarded;
    if (canRestart) {
      log.warn(`${TRANSFER_ERRORS.STALE_PARTIAL} (${cause}), reiniciando desde cero`);
      return this.attempt(request, expectedSize, partialPath, false);
    }
    return {
      status: 'failed',
      bytesTransferred: 0,
      bytesReceived: 0,
      error: new TransferError('integrity_mismatch', `${TRANSFER_ERRORS.STALE_PARTIAL} (${cause})`),
    };
  }

  /** Borra el parcial; devuelve un outcome de fallo solo si el borrado falla. */
  private async discardPartial(partialPath: string): Promise<TransferOutcome | null> {
    try {
      await removeFileIfExists(partialPath);
      return null;
    } catch (error) {
      return this.fsFailure(error, 'eliminando parcial', partialPath);
    }
  }

  private httpFailure(
    kind: 'not_found' | 'server_error' | 'http_error',
    message: string,
    statusCode: number,
    partialSize: number
  ): TransferOutcome {
    return {
      status: 'failed',
      bytesTransferred: partialSize,
      bytesReceived: 0,
      error: new TransferError(kind, message, { statusCode }),
    };
  }

  private async cancelledOutcome(partialPath: string, received: number, knownSize?: number): Promise<TransferOutcome> {
    let size = knownSize ?? 0;
    if (knownSize === undefined) {
      try {
        size = (await getFileSize(partialPath)) ?? 0;
      } catch (error) {
        return this.fsFailure(error, 'inspeccionando parcial', partialPath);
      }
    }
    return {
      status: 'partial',
      bytesTransferred: size,
      bytesReceived: received,
      reason: 'cancelled',
      error: null,
    };
  }

  private fsFailure(
    error: unknown,
    context: string,
    partialPath: string,
    bytesTransferred = 0,
    bytesReceived = 0
  ): TransferOutcome {
    const fsError = toFilesystemError(error, `${TRANSFER_ERRORS.FILESYSTEM} ${context} (${partialPath})`);
    log.error(fsError.message);
    return { status: 'failed', bytesTransferred, bytesReceived, error: fsError };
  }

  /** Libera los sockets keep-alive si el motor creó sus propios agentes. */
  close(): void {
    if (this.ownsAgents) destroyAgents(this.agents);
  }
}
