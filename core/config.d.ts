/**
 * Tipos para la configuración centralizada del motor.
 *
 * La implementación concreta y valores por defecto están en config.ts.
 */

/** Tipos de error de red con perfil de retry propio. */
export type RetryProfileName =
  | 'timeout'
  | 'connection_reset'
  | 'connection_refused'
  | 'dns'
  | 'pipe_broken'
  | 'server_overload'
  | 'server_error'
  | 'unknown';

export interface RetryProfile {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Factor de crecimiento exponencial por intento. */
  growthFactor: number;
  /** Jitter relativo (0.0-1.0) aplicado al delay calculado. */
  jitterFactor: number;
}

/** Severidad de un fallo reportado al registro de mirrors. */
export type FailureSeverity = 'minor' | 'moderate' | 'severe';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface AppConfig {
  /** Timeouts por operación de red, redirecciones y cabeceras. */
  network: {
    connectTimeout: number;
    /** Espera máxima hasta recibir las cabeceras de respuesta. */
    responseTimeout: number;
    /** Inactividad máxima del socket (también entre chunks del cuerpo). */
    idleTimeout: number;
    maxRedirects: number;
    retryAfterDefaultMs: number;
    retryAfterMaxMs: number;
    userAgent: string;
    maxSockets: number;
  };
  /** Concurrencia, intentos por tarea y escritura a disco. */
  downloads: {
    maxConcurrency: number;
    /** Techo duro para maxConcurrency (valores mayores se recortan). */
    maxConcurrencyLimit: number;
    maxAttemptsPerTask: number;
    maxSameMirrorRetries: number;
    partialSuffix: string;
    writeHighWaterMark: number;
    progressThrottleMs: number;
  };
  /** Dinámica de salud de los mirrors. */
  mirrors: {
    successIncrement: number;
    failureDecay: number;
    severityDecrements: Record<FailureSeverity, number>;
    /** Tras este tiempo una ausencia confirmada vuelve a considerarse desconocida. */
    absenceTtlMs: number;
    healthCheckTimeoutMs: number;
    autoPersist: boolean;
  };
  /** Parámetros del sorteo ponderado. */
  selection: {
    recencyWindowMs: number;
    recencyPenaltyFactor: number;
    countryBonus: number;
    preferredCountries: string[];
  };
  /** Perfiles de retry adaptativo por tipo de error. */
  retryProfiles: Record<RetryProfileName, RetryProfile>;
  /** Rutas absolutas: directorio base, DB de mirrors, lista semilla, config y logs. */
  paths: {
    homeDir: string;
    dbPath: string;
    seedMirrorsPath: string;
    configFile: string;
    logDirectory: string;
  };
  logging: {
    fileLevel: LogLevel;
    consoleLevel: LogLevel;
    maxSize: number;
    retentionDays: number;
  };
}
