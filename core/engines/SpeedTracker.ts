/**
 * Velocidad de transferencia y ETA por identificador usando media móvil exponencial (EMA).
 *
 * startTracking inicia la sesión; update() recibe bytes en disco y total y devuelve
 * speedBytesPerSec y remainingTime. stopTracking limpia la entrada. MirrorDownloader lo
 * usa para enriquecer los eventos taskProgress.
 *
 * @module engines/SpeedTracker
 */

export interface SpeedTrackerEntry {
  sessionStartTime: number;
  sessionTransferred: number;
  lastUpdate: number;
  lastTransferred: number;
  emaSpeed: number;
  emaRemainingTime: number | null;
}

export interface SpeedUpdateResult {
  speedBytesPerSec: number;
  /** Segundos; null si el total es desconocido o aún no hay velocidad. */
  remainingTime: number | null;
}

export class SpeedTracker {
  private trackers = new Map<string, SpeedTrackerEntry>();
  private readonly alpha: number;
  private readonly minTimeDelta: number;
  private readonly now: () => number;

  constructor(alpha = 0.3, minTimeDelta = 0.1, now: () => number = Date.now) {
    this.alpha = alpha;
    this.minTimeDelta = minTimeDelta;
    this.now = now;
  }

  /**
   * Al reanudar, pasar initialBytes (lo que ya había en disco) para que el primer
   * cálculo no cuente el histórico como bytes recientes.
   */
  startTracking(key: string, initialBytes = 0): void {
    const now = this.now();
    this.trackers.set(key, {
      sessionStartTime: now,
      sessionTransferred: 0,
      lastUpdate: now,
      lastTransferred: Math.max(0, initialBytes),
      emaSpeed: 0,
      emaRemainingTime: null,
    });
  }

  isTracking(key: string): boolean {
    return this.trackers.has(key);
  }

  update(key: string, transferredBytes: number, totalBytes: number | null): SpeedUpdateResult | null {
    const tracker = this.trackers.get(key);
    if (!tracker) return null;

    const now = this.now();
    const timeDelta = (now - tracker.lastUpdate) / 1000;
    const bytesDelta = transferredBytes - tracker.lastTransferred;

    let instantSpeed = 0;
    if (timeDelta >= this.minTimeDelta && bytesDelta >= 0) {
      instantSpeed = bytesDelta / timeDelta;
    }

    if (bytesDelta > 0 && timeDelta >= this.minTimeDelta) {
      tracker.lastUpdate = now;
      tracker.lastTransferred = transferredBytes;
      tracker.sessionTransferred += bytesDelta;
    }

    let speedBytesPerSec = 0;
    if (instantSpeed > 0) {
      tracker.emaSpeed =
        tracker.emaSpeed === 0 ? instantSpeed : this.alpha * instantSpeed + (1 - this.alpha) * tracker.emaSpeed;
      speedBytesPerSec = tracker.emaSpeed;
    } else if (tracker.emaSpeed > 0) {
      speedBytesPerSec = tracker.emaSpeed;
    } else {
      const totalElapsed = (now - tracker.sessionStartTime) / 1000;
      if (totalElapsed >= this.minTimeDelta && tracker.sessionTransferred > 0) {
        speedBytesPerSec = tracker.sessionTransferred / totalElapsed;
        tracker.emaSpeed = speedBytesPerSec;
      }
    }

    let remainingTime: number | null = null;
    if (totalBytes !== null && speedBytesPerSec > 0) {
      const remainingBytes = Math.max(0, totalBytes - transferredBytes);
      const instantRemaining = remainingBytes / speedBytesPerSec;
      if (tracker.emaRemainingTime === null || remainingBytes === 0) {
        tracker.emaRemainingTime = instantRemaining;
      } else {
        tracker.emaRemainingTime =
          this.alpha * instantRemaining + (1 - this.alpha) * tracker.emaRemainingTime;
      }
      remainingTime = tracker.emaRemainingTime;
    }

    return { speedBytesPerSec, remainingTime };
  }

  stopTracking(key: string): void {
    this.trackers.delete(key);
  }

  clear(): void {
    this.trackers.clear();
  }
}
