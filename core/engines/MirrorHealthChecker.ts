/**
 * Sondeo de salud de mirrors: HEAD a la URL base de cada uno.
 *
 * Status < 400 cuenta como éxito; cualquier otro status es un fallo moderado y un error
 * de red (timeout, conexión rechazada, DNS) un fallo severo. Los sondeos corren en paralelo
 * y cada uno actualiza salud y lastChecked en el registro.
 *
 * @module MirrorHealthChecker
 */

import config from '../config';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import { createAgents, destroyAgents, openRequest, toNetworkError } from '../utils/httpRequest';
import type { HttpAgents } from '../utils/httpRequest';
import type { MirrorRegistry } from './MirrorRegistry';
import type { MirrorSite } from './types';

const log = logger.child('MirrorHealthChecker');

export interface MirrorCheckResult {
  mirror: string;
  ok: boolean;
  statusCode: number | null;
  latencyMs: number;
  healthScore: number;
  error: string | null;
}

export interface MirrorHealthCheckerOptions {
  timeoutMs?: number;
  network?: Partial<AppConfig['network']>;
  agents?: HttpAgents;
  now?: () => number;
}

export class MirrorHealthChecker {
  private readonly registry: MirrorRegistry;
  private readonly timeoutMs: number;
  private readonly network: AppConfig['network'];
  private readonly agents: HttpAgents;
  private readonly ownsAgents: boolean;
  private readonly now: () => number;

  constructor(registry: MirrorRegistry, options: MirrorHealthCheckerOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? config.mirrors.healthCheckTimeoutMs;
    this.network = { ...config.network, ...options.network };
    this.ownsAgents = !options.agents;
    this.agents = options.agents ?? createAgents(this.network.maxSockets);
    this.now = options.now ?? Date.now;
  }

  /** Sondea todos los mirrors registrados (también los inactivos, para poder reactivarlos). */
  async checkAll(signal?: AbortSignal): Promise<MirrorCheckResult[]> {
    const mirrors = this.registry.listMirrors();
    const done = log.startOperation(`Sondeo de ${mirrors.length} mirrors`);
    const results = await Promise.all(mirrors.map(mirror => this.checkMirror(mirror, signal)));
    done(`${results.filter(r => r.ok).length}/${results.length} responden`);
    return results;
  }

  async checkMirror(mirror: MirrorSite, signal?: AbortSignal): Promise<MirrorCheckResult> {
    const startedAt = this.now();
    try {
      const { response, statusCode } = await openRequest(`${mirror.baseUrl}/`, {
        method: 'HEAD',
        headers: { 'User-Agent': this.network.userAgent },
        signal,
        connectTimeout: this.timeoutMs,
        responseTimeout: this.timeoutMs,
        idleTimeout: this.timeoutMs,
        maxRedirects: this.network.maxRedirects,
        agents: this.agents,
      });
      response.resume();
      const latencyMs = this.now() - startedAt;

      if (statusCode < 400) {
        const updated = this.registry.reportSuccess(mirror.name);
        log.debug(`${mirror.name}: HTTP ${statusCode} en ${latencyMs}ms`);
        return { mirror: mirror.name, ok: true, statusCode, latencyMs, healthScore: updated.healthScore, error: null };
      }

      const message = `HTTP ${statusCode}`;
      const updated = this.registry.reportFailure(mirror.name, 'moderate', message);
      log.warn(`${mirror.name}: ${message}`);
      return { mirror: mirror.name, ok: false, statusCode, latencyMs, healthScore: updated.healthScore, error: message };
    } catch (error) {
      const networkError = toNetworkError(error);
      const updated = this.registry.reportFailure(mirror.name, 'severe', networkError.message);
      log.warn(`${mirror.name} no responde: ${networkError.message}`);
      return {
        mirror: mirror.name,
        ok: false,
        statusCode: null,
        latencyMs: this.now() - startedAt,
        healthScore: updated.healthScore,
        error: networkError.message,
      };
    }
  }

  close(): void {
    if (this.ownsAgents) destroyAgents(this.agents);
  }
}
