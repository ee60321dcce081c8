/**
 * Semáforo de slots de transferencia.
 *
 * tryAcquire/release para uso síncrono y acquire() para esperar turno en orden FIFO.
 * El coordinador adquiere un slot antes de despachar cada tarea y lo libera al terminar.
 *
 * @module ConcurrencyController
 */

export interface ConcurrencyControllerOptions {
  /** Máximo de transferencias en vuelo a la vez. */
  maxConcurrent?: number;
}

interface Waiter {
  resolve: (_acquired: boolean) => void;
  signal: AbortSignal | undefined;
  onAbort: () => void;
}

export class ConcurrencyController {
  private _maxConcurrent: number;
  private _active = 0;
  private _peak = 0;
  private readonly waiters: Waiter[] = [];

  constructor(options: ConcurrencyControllerOptions = {}) {
    this._maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent ?? 3));
  }

  /** Intenta adquirir un slot. Devuelve true si se adquirió, false si ya se alcanzó el límite. */
  tryAcquire(): boolean {
    if (this._active >= this._maxConcurrent) return false;
    this._active++;
    this._peak = Math.max(this._peak, this._active);
    return true;
  }

  /**
   * Espera un slot libre. Resuelve false (sin slot) si la señal se aborta antes.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.tryAcquire()) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      const waiter: Waiter = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(false);
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Libera un slot y lo cede al primer waiter. Idempotente (no baja de 0). */
  release(): void {
    if (this._active > 0) this._active--;
    this.drainWaiters();
  }

  private drainWaiters(): void {
    while (this.waiters.length > 0 && this._active < this._maxConcurrent) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      waiter.signal?.removeEventListener('abort', waiter.onAbort);
      this._active++;
      this._peak = Math.max(this._peak, this._active);
      waiter.resolve(true);
    }
  }

  /** Slots actualmente en uso. */
  getActiveCount(): number {
    return this._active;
  }

  getAvailableSlots(): number {
    return Math.max(0, this._maxConcurrent - this._active);
  }

  /** Máximo de slots ocupados a la vez desde la creación. */
  getPeak(): number {
    return this._peak;
  }

  getWaitingCount(): number {
    return this.waiters.length;
  }

  /** Actualiza el máximo; si sube, despierta a los waiters que quepan. */
  setMaxConcurrent(value: number): void {
    this._maxConcurrent = Math.max(1, Math.floor(value));
    this.drainWaiters();
  }

  get maxConcurrent(): number {
    return this._maxConcurrent;
  }
}
