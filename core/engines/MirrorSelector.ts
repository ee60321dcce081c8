/**
 * Selección de mirror por sorteo ponderado.
 *
 * peso = salud × factorPrioridad × penalizaciónRecencia × bonusPaís
 *
 * - factorPrioridad = max(1, prioridad)
 * - penalizaciónRecencia = 1 / (1 + factor × usos en la ventana reciente)
 * - bonusPaís se aplica si el país del mirror está en la lista preferida
 *
 * El sorteo usa pesos acumulados y una única muestra uniforme de una fuente aleatoria
 * inyectable. Si todos los pesos son 0 se elige de forma uniforme entre los elegibles.
 *
 * @module MirrorSelector
 */

import config from '../config';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import { UsageWindow } from '../utils/usageWindow';
import type { Clock } from '../utils/usageWindow';
import type { MirrorRegistry } from './MirrorRegistry';
import type { MirrorSite } from './types';

const log = logger.child('MirrorSelector');

export type RandomSource = () => number;

export type SelectionSettings = AppConfig['selection'];

export interface MirrorSelectorOptions {
  settings?: Partial<SelectionSettings>;
  random?: RandomSource;
  now?: Clock;
}

export interface WeightedCandidate {
  mirror: MirrorSite;
  weight: number;
}

/**
 * Índice elegido con una muestra uniforme sobre los pesos acumulados.
 * Pesos no finitos o negativos cuentan como 0; si todos son 0 el reparto es uniforme.
 *
 * @returns Índice en [0, weights.length), o -1 si la lista está vacía.
 */
export function weightedPick(weights: readonly number[], random: RandomSource): number {
  if (weights.length === 0) return -1;

  const cumulative: number[] = [];
  let total = 0;
  for (const weight of weights) {
    total += Number.isFinite(weight) && weight > 0 ? weight : 0;
    cumulative.push(total);
  }

  const sample = Math.min(Math.max(random(), 0), 1 - Number.EPSILON);

  if (total <= 0) {
    return Math.floor(sample * weights.length);
  }

  const target = sample * total;
  for (let i = 0; i < cumulative.length; i++) {
    if (target < cumulative[i]) return i;
  }
  // Redondeo en el último tramo
  for (let i = cumulative.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return i;
  }
  return cumulative.length - 1;
}

export class MirrorSelector {
  private readonly registry: MirrorRegistry;
  private readonly settings: SelectionSettings;
  private readonly random: RandomSource;
  private readonly recentUses: UsageWindow;
  private readonly preferred: Set<string>;

  constructor(registry: MirrorRegistry, options: MirrorSelectorOptions = {}) {
    this.registry = registry;
    this.settings = { ...config.selection, ...options.settings };
    this.random = options.random ?? Math.random;
    this.recentUses = new UsageWindow(this.settings.recencyWindowMs, options.now ?? Date.now);
    this.preferred = new Set(this.settings.preferredCountries.map(c => c.toUpperCase()));
  }

  /** Peso de un mirror activo y elegible. */
  weightOf(mirror: MirrorSite): number {
    const priorityFactor = Math.max(1, mirror.priority);
    const recencyPenalty =
      1 / (1 + this.settings.recencyPenaltyFactor * this.recentUses.count(mirror.name));
    const countryBonus =
      mirror.country !== null && this.preferred.has(mirror.country.toUpperCase())
        ? this.settings.countryBonus
        : 1;
    return mirror.healthScore * priorityFactor * recencyPenalty * countryBonus;
  }

  /**
   * Mirrors elegibles con su peso: activos, sin ausencia confirmada para el
   * identificador, fuera de `exclude` y, si se pasan, dentro de `candidates`.
   */
  rank(
    identifier: string,
    candidates: readonly string[] | null = null,
    exclude: ReadonlySet<string> = new Set()
  ): WeightedCandidate[] {
    const absent = this.registry.getAbsentMirrors(identifier);
    const allowed = candidates ? new Set(candidates) : null;

    return this.registry
      .listActiveMirrors()
      .filter(m => !absent.has(m.name) && !exclude.has(m.name))
      .filter(m => allowed === null || allowed.has(m.name))
      .map(mirror => ({ mirror, weight: this.weightOf(mirror) }));
  }

  /**
   * Elige un mirror para el identificador, o null si no queda ninguno elegible.
   * Registra el uso para la penalización por recencia.
   */
  select(
    identifier: string,
    candidates: readonly string[] | null = null,
    exclude: ReadonlySet<string> = new Set()
  ): MirrorSite | null {
    const ranked = this.rank(identifier, candidates, exclude);
    if (ranked.length === 0) {
      log.debug(`Sin mirrors elegibles para ${identifier} (excluidos: ${exclude.size})`);
      return null;
    }

    const index = weightedPick(
      ranked.map(r => r.weight),
      this.random
    );
    const chosen = ranked[index].mirror;
    this.recentUses.record(chosen.name);
    log.debug(
      `Mirror ${chosen.name} elegido para ${identifier} entre ${ranked.length} ` +
        `(peso ${ranked[index].weight.toFixed(3)})`
    );
    return chosen;
  }

  /** Descarta los mirrors sin usos dentro de la ventana. */
  pruneRecency(): number {
    return this.recentUses.cleanup();
  }

  /** Olvida los usos recientes (p. ej. entre lotes). */
  resetRecency(): void {
    this.recentUses.reset();
  }
}
