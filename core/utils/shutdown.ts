/**
 * @fileoverview Cancelación de lotes ante señales del sistema.
 * @module shutdown
 *
 * La primera señal aborta el AbortController del lote para que las transferencias
 * en vuelo se detengan en un punto seguro (archivo .part consistente). Una segunda
 * señal fuerza la salida del proceso.
 */

import { logger } from './logger';

const log = logger.child('Shutdown');

export type ShutdownSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

/** Emisor de señales; `process` en producción. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (_signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (_signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownHandlerOptions {
  signals?: ShutdownSignal[];
  /** Se invoca tras abortar el lote (p. ej. persistir el registro). */
  onShutdown?: (_signal: NodeJS.Signals) => void;
  /** Por defecto process.exit; inyectable para tests. */
  forceExit?: (_code: number) => void;
  processRef?: SignalSource;
}

/**
 * Instala los handlers y devuelve una función que los desinstala.
 */
export function installShutdownHandler(
  controller: AbortController,
  options: ShutdownHandlerOptions = {}
): () => void {
  const {
    signals = ['SIGINT', 'SIGTERM', 'SIGHUP'],
    onShutdown,
    forceExit = (code: number) => process.exit(code),
    processRef = process,
  } = options;

  let received = 0;

  const handler = (signal: NodeJS.Signals): void => {
    received++;
    if (received > 1) {
      log.warn(`Segunda señal ${signal}: saliendo sin esperar a las transferencias`);
      forceExit(130);
      return;
    }
    log.info(`Señal ${signal} recibida: pausando transferencias en curso`);
    controller.abort();
    onShutdown?.(signal);
  };

  for (const signal of signals) {
    processRef.on(signal, handler);
  }

  return () => {
    for (const signal of signals) {
      processRef.removeListener(signal, handler);
    }
  };
}
