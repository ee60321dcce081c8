/**
 * @fileoverview Petición HTTP(S) de bajo nivel con timeouts por operación.
 * @module httpRequest
 *
 * openRequest resuelve cuando llegan las cabeceras de respuesta (siguiendo redirecciones)
 * y deja el cuerpo sin consumir. Timeouts: conexión, espera de cabeceras e inactividad del
 * socket; este último sigue vigente mientras se lee el cuerpo.
 */

import http from 'http';
import https from 'https';
import { logger } from './logger';
import { TransferError, readErrorCode, readErrorMessage } from '../engines/TransferError';
import { TRANSFER_ERRORS } from '../constants/errors';

const log = logger.child('HttpRequest');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export interface HttpAgents {
  http: http.Agent;
  https: https.Agent;
}

/** Agentes keep-alive compartidos por todas las transferencias de un motor. */
export function createAgents(maxSockets: number): HttpAgents {
  return {
    http: new http.Agent({ keepAlive: true, maxSockets }),
    https: new https.Agent({ keepAlive: true, maxSockets }),
  };
}

export function destroyAgents(agents: HttpAgents): void {
  agents.http.destroy();
  agents.https.destroy();
}

export interface OpenRequestOptions {
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  signal?: AbortSignal;
  connectTimeout: number;
  responseTimeout: number;
  idleTimeout: number;
  maxRedirects: number;
  agents?: HttpAgents;
}

export interface OpenedResponse {
  response: http.IncomingMessage;
  statusCode: number;
  /** URL final tras redirecciones. */
  url: string;
  request: http.ClientRequest;
}

export function cancelledError(): TransferError {
  return new TransferError('connection', TRANSFER_ERRORS.CANCELLED, { code: 'ABORT_ERR' });
}

/** Normaliza errores de socket a TransferError (timeout o connection). */
export function toNetworkError(error: unknown): TransferError {
  if (error instanceof TransferError) return error;
  const code = readErrorCode(error);
  const message = readErrorMessage(error);
  if (code && TIMEOUT_CODES.has(code)) {
    return new TransferError('timeout', `${TRANSFER_ERRORS.TIMEOUT}: ${message}`, { code, cause: error });
  }
  return new TransferError('connection', `${TRANSFER_ERRORS.CONNECTION}: ${message}`, {
    code,
    cause: error,
  });
}

function sendOnce(url: string, options: OpenRequestOptions): Promise<OpenedResponse> {
  return new Promise<OpenedResponse>((resolve, reject) => {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      reject(new TransferError('invalid_request', `${TRANSFER_ERRORS.INVALID_URL}: ${url}`, { cause: error }));
      return;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      reject(new TransferError('invalid_request', `${TRANSFER_ERRORS.INVALID_URL}: ${url}`));
      return;
    }
    const { signal } = options;
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }

    const isHttps = parsed.protocol === 'https:';
    const requestOptions: https.RequestOptions = {
      method: options.method ?? 'GET',
      headers: options.headers,
    };
    if (options.agents) {
      requestOptions.agent = isHttps ? options.agents.https : options.agents.http;
    }

    let settled = false;
    let activeResponse: http.IncomingMessage | null = null;
    let responseTimer: NodeJS.Timeout | null = null;
    let connectTimer: NodeJS.Timeout | null = null;

    const clearTimers = (): void => {
      if (responseTimer) clearTimeout(responseTimer);
      if (connectTimer) clearTimeout(connectTimer);
      responseTimer = null;
      connectTimer = null;
    };

    const onResponse = (response: http.IncomingMessage): void => {
      settled = true;
      activeResponse = response;
      clearTimers();
      signal?.removeEventListener('abort', onAbort);
      resolve({ response, statusCode: response.statusCode ?? 0, url, request: req });
    };

    const req = isHttps
      ? https.request(parsed, requestOptions, onResponse)
      : http.request(parsed, requestOptions, onResponse);

    const onAbort = (): void => {
      req.destroy(cancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    responseTimer = setTimeout(() => {
      req.destroy(
        new TransferError(
          'timeout',
          `${TRANSFER_ERRORS.TIMEOUT}: sin respuesta en ${options.responseTimeout}ms`,
          { code: 'ETIMEDOUT' }
        )
      );
    }, options.responseTimeout);

    // Inactividad del socket: cubre la espera de cada chunk del cuerpo
    req.setTimeout(options.idleTimeout, () => {
      const idleError = new TransferError(
        'timeout',
        `${TRANSFER_ERRORS.TIMEOUT}: socket inactivo durante ${options.idleTimeout}ms`,
        { code: 'ETIMEDOUT' }
      );
      // Con la respuesta ya entregada el error tiene que llegar por el stream del cuerpo
      activeResponse?.destroy(idleError);
      req.destroy(idleError);
    });

    req.on('socket', socket => {
      if (!socket.connecting) return;
      connectTimer = setTimeout(() => {
        req.destroy(
          new TransferError(
            'timeout',
            `${TRANSFER_ERRORS.TIMEOUT}: conexión no establecida en ${options.connectTimeout}ms`,
            { code: 'ETIMEDOUT' }
          )
        );
      }, options.connectTimeout);
      socket.once('connect', () => {
        if (connectTimer) clearTimeout(connectTimer);
        connectTimer = null;
      });
    });

    req.on('error', error => {
      clearTimers();
      signal?.removeEventListener('abort', onAbort);
      // Tras la respuesta los errores llegan por el stream del cuerpo
      if (settled) return;
      settled = true;
      reject(toNetworkError(error));
    });

    req.end();
  });
}

/**
 * Abre una petición y resuelve con la respuesta final tras seguir hasta
 * maxRedirects redirecciones. El cuerpo queda pendiente de consumir.
 */
export async function openRequest(url: string, options: OpenRequestOptions): Promise<OpenedResponse> {
  let currentUrl = url;
  for (let redirects = 0; ; redirects++) {
    const opened = await sendOnce(currentUrl, options);
    const location = opened.response.headers.location;

    if (!REDIRECT_STATUSES.has(opened.statusCode) || !location) {
      return opened;
    }

    opened.response.resume();
    if (redirects >= options.maxRedirects) {
      throw new TransferError('http_error', `${TRANSFER_ERRORS.TOO_MANY_REDIRECTS} (${options.maxRedirects})`, {
        statusCode: opened.statusCode,
      });
    }
    const nextUrl = new URL(location, currentUrl).toString();
    log.debug(`Redirección ${opened.statusCode}: ${currentUrl} → ${nextUrl}`);
    currentUrl = nextUrl;
  }
}
