/**
 * @fileoverview Ventana deslizante de usos por clave.
 * @module usageWindow
 *
 * Cuenta cuántas veces se registró una clave en los últimos windowMs. El selector de
 * mirrors la usa para penalizar los mirrors recién elegidos y repartir carga.
 */

export type Clock = () => number;

export class UsageWindow {
  private readonly windowMs: number;
  private readonly now: Clock;
  private usages = new Map<string, number[]>();

  /**
   * @param windowMs - Duración de la ventana; 0 la desactiva (count siempre 0).
   * @param now - Reloj inyectable para tests.
   */
  constructor(windowMs: number, now: Clock = Date.now) {
    if (windowMs < 0 || !Number.isFinite(windowMs)) {
      throw new Error('windowMs debe ser un número finito >= 0');
    }
    this.windowMs = windowMs;
    this.now = now;
  }

  get enabled(): boolean {
    return this.windowMs > 0;
  }

  private recent(key: string, now: number): number[] {
    const timestamps = this.usages.get(key) ?? [];
    return timestamps.filter(ts => now - ts < this.windowMs);
  }

  /** Registra un uso de la clave. */
  record(key: string): void {
    if (!this.enabled) return;
    const now = this.now();
    const recent = this.recent(key, now);
    recent.push(now);
    this.usages.set(key, recent);
  }

  /** Usos de la clave dentro de la ventana actual. */
  count(key: string): number {
    if (!this.enabled) return 0;
    return this.recent(key, this.now()).length;
  }

  /** Elimina claves sin usos recientes. Devuelve cuántas se borraron. */
  cleanup(): number {
    const now = this.now();
    let removedCount = 0;

    for (const [key, timestamps] of this.usages.entries()) {
      const recent = timestamps.filter(ts => now - ts < this.windowMs);
      if (recent.length === 0) {
        this.usages.delete(key);
        removedCount++;
      } else {
        this.usages.set(key, recent);
      }
    }

    return removedCount;
  }

  reset(key?: string): void {
    if (key === undefined) this.usages.clear();
    else this.usages.delete(key);
  }
}
