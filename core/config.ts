/**
 * Configuración por defecto del motor (valores de runtime) y carga por capas.
 *
 * Orden de aplicación: valores por defecto → `<homeDir>/config.json` (si existe) →
 * variables de entorno MIRRORFETCH_* → sobrescrituras programáticas. Cada capa se
 * valida con Zod antes de mezclarse.
 *
 * @module config
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AppConfig, RetryProfile, RetryProfileName } from './config.d';
import { logger } from './utils/logger';
import { validateConfigOverrides } from './utils/schemas';
import type { ConfigOverrides } from './utils/schemas';
import { CONFIG_ERRORS } from './constants/errors';

export type { AppConfig, RetryProfile, RetryProfileName };
export type { FailureSeverity, LogLevel } from './config.d';

const log = logger.child('Config');

/** Localiza resources/ tanto desde las fuentes (core/) como desde el build (dist/core/). */
function resolveResourcePath(fileName: string): string {
  const candidates = [
    path.resolve(__dirname, '..', 'resources', fileName),
    path.resolve(__dirname, '..', '..', 'resources', fileName),
    path.resolve(process.cwd(), 'resources', fileName),
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}

function buildPaths(homeDir: string): AppConfig['paths'] {
  return {
    homeDir,
    dbPath: path.join(homeDir, 'mirrors.db'),
    seedMirrorsPath: resolveResourcePath('mirrors.json'),
    configFile: path.join(homeDir, 'config.json'),
    logDirectory: path.join(homeDir, 'logs'),
  };
}

const defaultHomeDir = process.env.MIRRORFETCH_HOME ?? path.join(os.homedir(), '.mirrorfetch');

const RETRY_PROFILE_NAMES: readonly RetryProfileName[] = [
  'timeout',
  'connection_reset',
  'connection_refused',
  'dns',
  'pipe_broken',
  'server_overload',
  'server_error',
  'unknown',
];

const DEFAULT_RETRY_PROFILES: Record<RetryProfileName, RetryProfile> = {
  // Servidor lento pero vivo → retry rápido
  timeout: { baseDelayMs: 2_000, maxDelayMs: 20_000, growthFactor: 1.5, jitterFactor: 0.2 },
  connection_reset: { baseDelayMs: 3_000, maxDelayMs: 30_000, growthFactor: 2, jitterFactor: 0.3 },
  connection_refused: { baseDelayMs: 5_000, maxDelayMs: 60_000, growthFactor: 2.5, jitterFactor: 0.3 },
  dns: { baseDelayMs: 5_000, maxDelayMs: 60_000, growthFactor: 2, jitterFactor: 0.2 },
  pipe_broken: { baseDelayMs: 2_000, maxDelayMs: 30_000, growthFactor: 2, jitterFactor: 0.3 },
  // Fallback cuando un 429 llega sin Retry-After
  server_overload: { baseDelayMs: 30_000, maxDelayMs: 300_000, growthFactor: 2, jitterFactor: 0.1 },
  // 5xx: se cambia de mirror, espera corta
  server_error: { baseDelayMs: 500, maxDelayMs: 5_000, growthFactor: 2, jitterFactor: 0.2 },
  unknown: { baseDelayMs: 1_000, maxDelayMs: 30_000, growthFactor: 2, jitterFactor: 0.3 },
};

/** Valores por defecto sin aplicar archivo, entorno ni sobrescrituras. */
export function createDefaultConfig(homeDir: string = defaultHomeDir): AppConfig {
  return {
    network: {
      connectTimeout: 10_000,
      responseTimeout: 30_000,
      idleTimeout: 30_000,
      maxRedirects: 5,
      retryAfterDefaultMs: 60_000,
      retryAfterMaxMs: 300_000,
      userAgent: 'mirrorfetch/1.0 (+https://example.invalid/mirrorfetch)',
      maxSockets: 16,
    },

    downloads: {
      maxConcurrency: 5,
      maxConcurrencyLimit: 10,
      maxAttemptsPerTask: 6,
      maxSameMirrorRetries: 2,
      partialSuffix: '.part',
      writeHighWaterMark: 64 * 1024,
      progressThrottleMs: 250,
    },

    mirrors: {
      successIncrement: 0.1,
      failureDecay: 1,
      // Un not-found cuesta menos: puede reflejar un catálogo incompleto
      severityDecrements: { minor: 0.05, moderate: 0.2, severe: 0.4 },
      absenceTtlMs: 24 * 60 * 60 * 1000,
      healthCheckTimeoutMs: 10_000,
      autoPersist: true,
    },

    selection: {
      recencyWindowMs: 5_000,
      recencyPenaltyFactor: 0.5,
      countryBonus: 1.5,
      preferredCountries: [],
    },

    retryProfiles: { ...DEFAULT_RETRY_PROFILES },

    paths: buildPaths(homeDir),

    logging: {
      fileLevel: 'info',
      consoleLevel: 'info',
      maxSize: 10 * 1024 * 1024,
      retentionDays: 14,
    },
  };
}

function mergeRetryProfiles(
  base: Record<RetryProfileName, RetryProfile>,
  overrides: ConfigOverrides['retryProfiles']
): Record<RetryProfileName, RetryProfile> {
  const merged = { ...base };
  if (!overrides) return merged;
  for (const name of RETRY_PROFILE_NAMES) {
    const override = overrides[name];
    if (override) merged[name] = { ...merged[name], ...override };
  }
  return merged;
}

/** Mezcla una capa de sobrescrituras ya validada sobre una configuración completa. */
export function applyOverrides(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  const homeDir = overrides.paths?.homeDir;
  const basePaths = homeDir && homeDir !== base.paths.homeDir ? buildPaths(homeDir) : base.paths;

  return {
    network: { ...base.network, ...overrides.network },
    downloads: { ...base.downloads, ...overrides.downloads },
    mirrors: {
      ...base.mirrors,
      ...overrides.mirrors,
      severityDecrements: {
        ...base.mirrors.severityDecrements,
        ...overrides.mirrors?.severityDecrements,
      },
    },
    selection: { ...base.selection, ...overrides.selection },
    retryProfiles: mergeRetryProfiles(base.retryProfiles, overrides.retryProfiles),
    paths: { ...basePaths, ...overrides.paths },
    logging: { ...base.logging, ...overrides.logging },
  };
}

/** Traduce variables MIRRORFETCH_* a una capa de sobrescrituras sin validar. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const layer: Record<string, Record<string, unknown>> = {};

  if (env.MIRRORFETCH_HOME) {
    layer.paths = { homeDir: env.MIRRORFETCH_HOME };
  }
  if (env.MIRRORFETCH_MAX_CONCURRENCY) {
    layer.downloads = { maxConcurrency: Number(env.MIRRORFETCH_MAX_CONCURRENCY) };
  }
  if (env.MIRRORFETCH_PREFERRED_COUNTRIES) {
    layer.selection = {
      preferredCountries: env.MIRRORFETCH_PREFERRED_COUNTRIES.split(',')
        .map(code => code.trim())
        .filter(code => code.length > 0),
    };
  }
  if (env.MIRRORFETCH_LOG_LEVEL) {
    layer.logging = {
      fileLevel: env.MIRRORFETCH_LOG_LEVEL,
      consoleLevel: env.MIRRORFETCH_LOG_LEVEL,
    };
  }
  return layer;
}

function readFileOverrides(configFile: string): ConfigOverrides | null {
  if (!fs.existsSync(configFile)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${CONFIG_ERRORS.INVALID_FILE} (${configFile}): ${message}`);
  }

  const result = validateConfigOverrides(raw);
  if (!result.success || !result.data) {
    throw new Error(`${CONFIG_ERRORS.INVALID_FILE} (${configFile}): ${result.error ?? ''}`);
  }
  log.info(`Configuración cargada desde ${configFile}`);
  return result.data;
}

export interface LoadConfigOptions {
  /** Sobrescrituras programáticas (máxima prioridad). */
  overrides?: unknown;
  env?: NodeJS.ProcessEnv;
  /** false para ignorar `<homeDir>/config.json`. */
  readConfigFile?: boolean;
}

/**
 * Construye la configuración efectiva aplicando las capas en orden.
 * Lanza Error si alguna capa no supera la validación.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { env = process.env, readConfigFile = true } = options;

  const envResult = validateConfigOverrides(readEnvOverrides(env));
  if (!envResult.success || !envResult.data) {
    throw new Error(`${CONFIG_ERRORS.INVALID_ENV}: ${envResult.error ?? ''}`);
  }

  let programmatic: ConfigOverrides = {};
  if (options.overrides !== undefined) {
    const result = validateConfigOverrides(options.overrides);
    if (!result.success || !result.data) {
      throw new Error(`${CONFIG_ERRORS.INVALID_OVERRIDES}: ${result.error ?? ''}`);
    }
    programmatic = result.data;
  }

  // El homeDir decide dónde buscar config.json
  const homeDir = programmatic.paths?.homeDir ?? envResult.data.paths?.homeDir ?? defaultHomeDir;
  let effective = createDefaultConfig(homeDir);

  if (readConfigFile) {
    const fileLayer = readFileOverrides(programmatic.paths?.configFile ?? effective.paths.configFile);
    if (fileLayer) effective = applyOverrides(effective, fileLayer);
  }

  effective = applyOverrides(effective, envResult.data);
  effective = applyOverrides(effective, programmatic);

  if (effective.downloads.maxConcurrency > effective.downloads.maxConcurrencyLimit) {
    log.warn(
      `maxConcurrency ${effective.downloads.maxConcurrency} supera el límite ` +
        `${effective.downloads.maxConcurrencyLimit}; se recorta`
    );
    effective.downloads.maxConcurrency = effective.downloads.maxConcurrencyLimit;
  }

  return effective;
}

const config: AppConfig = createDefaultConfig();

export default config;
