/**
 * @fileoverview Schemas de validación usando Zod: lista de mirrors, peticiones de descarga
 * y sobrescrituras de configuración (archivo, entorno y programáticas).
 * @module schemas
 */

import { z } from 'zod';
import { VALIDATIONS } from '../constants/validations';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const httpUrlSchema = z
  .string()
  .trim()
  .url(VALIDATIONS.MIRROR.URL_INVALID)
  .refine(value => /^https?:\/\//i.test(value), VALIDATIONS.MIRROR.URL_INVALID);

const mirrorSeedSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, VALIDATIONS.MIRROR.NAME_EMPTY)
    .max(200, VALIDATIONS.MIRROR.NAME_TOO_LONG),
  baseUrl: httpUrlSchema,
  country: z
    .string()
    .trim()
    .min(2, VALIDATIONS.CONFIG.COUNTRY_CODE)
    .max(3, VALIDATIONS.CONFIG.COUNTRY_CODE)
    .transform(val => val.toUpperCase())
    .nullable()
    .optional(),
  priority: z.number().int(VALIDATIONS.MIRROR.PRIORITY_INTEGER).optional().default(1),
  isActive: z.boolean().optional().default(true),
  healthScore: z.number().min(0, VALIDATIONS.MIRROR.HEALTH_RANGE).max(1, VALIDATIONS.MIRROR.HEALTH_RANGE).optional(),
});

const mirrorListSchema = z.object({
  version: z.number().int().positive().optional(),
  mirrors: z.array(mirrorSeedSchema).min(1, VALIDATIONS.MIRROR.LIST_EMPTY),
});

const downloadRequestSchema = z.object({
  identifier: z
    .union([
      z.string().trim().min(1, VALIDATIONS.REQUEST.IDENTIFIER_EMPTY),
      z.number().int().nonnegative(),
    ])
    .transform(val => String(val)),
  destinationPath: z.string().min(1, VALIDATIONS.REQUEST.DESTINATION_EMPTY),
  canonicalPath: z.string().min(1).optional(),
  expectedSize: z
    .number()
    .int()
    .nonnegative(VALIDATIONS.REQUEST.SIZE_NON_NEGATIVE)
    .nullable()
    .optional(),
  priority: z.number().int(VALIDATIONS.REQUEST.PRIORITY_INTEGER).optional().default(0),
});

const positiveInt = z.number().int().positive(VALIDATIONS.CONFIG.POSITIVE);
const nonNegativeInt = z.number().int().nonnegative();
const fraction = z.number().min(0, VALIDATIONS.CONFIG.FRACTION).max(1, VALIDATIONS.CONFIG.FRACTION);
const logLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']);

const retryProfileOverrideSchema = z
  .object({
    baseDelayMs: nonNegativeInt,
    maxDelayMs: nonNegativeInt,
    growthFactor: z.number().min(1),
    jitterFactor: fraction,
  })
  .partial()
  .strict();

const configOverridesSchema = z
  .object({
    network: z
      .object({
        connectTimeout: positiveInt,
        responseTimeout: positiveInt,
        idleTimeout: positiveInt,
        maxRedirects: nonNegativeInt,
        retryAfterDefaultMs: nonNegativeInt,
        retryAfterMaxMs: nonNegativeInt,
        userAgent: z.string().min(1),
        maxSockets: positiveInt,
      })
      .partial()
      .strict(),
    downloads: z
      .object({
        maxConcurrency: z.number().int().min(1, VALIDATIONS.CONFIG.CONCURRENCY_RANGE).max(64, VALIDATIONS.CONFIG.CONCURRENCY_RANGE),
        maxConcurrencyLimit: z.number().int().min(1).max(64),
        maxAttemptsPerTask: positiveInt,
        maxSameMirrorRetries: nonNegativeInt,
        partialSuffix: z.string().regex(/^\.[A-Za-z0-9_-]+$/),
        writeHighWaterMark: positiveInt,
        progressThrottleMs: nonNegativeInt,
      })
      .partial()
      .strict(),
    mirrors: z
      .object({
        successIncrement: fraction,
        failureDecay: nonNegativeInt,
        severityDecrements: z
          .object({ minor: fraction, moderate: fraction, severe: fraction })
          .partial()
          .strict(),
        absenceTtlMs: nonNegativeInt,
        healthCheckTimeoutMs: positiveInt,
        autoPersist: z.boolean(),
      })
      .partial()
      .strict(),
    selection: z
      .object({
        recencyWindowMs: nonNegativeInt,
        recencyPenaltyFactor: z.number().nonnegative(),
        countryBonus: z.number().min(1),
        preferredCountries: z.array(
          z.string().trim().min(2, VALIDATIONS.CONFIG.COUNTRY_CODE).max(3, VALIDATIONS.CONFIG.COUNTRY_CODE).transform(val => val.toUpperCase())
        ),
      })
      .partial()
      .strict(),
    retryProfiles: z
      .object({
        timeout: retryProfileOverrideSchema,
        connection_reset: retryProfileOverrideSchema,
        connection_refused: retryProfileOverrideSchema,
        dns: retryProfileOverrideSchema,
        pipe_broken: retryProfileOverrideSchema,
        server_overload: retryProfileOverrideSchema,
        server_error: retryProfileOverrideSchema,
        unknown: retryProfileOverrideSchema,
      })
      .partial()
      .strict(),
    paths: z
      .object({
        homeDir: z.string().min(1),
        dbPath: z.string().min(1),
        seedMirrorsPath: z.string().min(1),
        configFile: z.string().min(1),
        logDirectory: z.string().min(1),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        fileLevel: logLevelSchema,
        consoleLevel: logLevelSchema,
        maxSize: positiveInt,
        retentionDays: positiveInt,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type MirrorSeed = z.infer<typeof mirrorSeedSchema>;
export type MirrorSeedInput = z.input<typeof mirrorSeedSchema>;
export type MirrorList = z.infer<typeof mirrorListSchema>;
export type DownloadRequest = z.infer<typeof downloadRequestSchema>;
export type DownloadRequestInput = z.input<typeof downloadRequestSchema>;
export type ConfigOverrides = z.infer<typeof configOverridesSchema>;
export type ConfigOverridesInput = z.input<typeof configOverridesSchema>;

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ZodValidationResult<z.infer<S>> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      error: `${VALIDATIONS.GENERIC.VALIDATION_ERROR}: ${message}`,
    };
  }
}

export function validateMirrorSeed(seed: unknown): ZodValidationResult<MirrorSeed> {
  return validate(mirrorSeedSchema, seed);
}

export function validateMirrorList(data: unknown): ZodValidationResult<MirrorList> {
  return validate(mirrorListSchema, data);
}

export function validateDownloadRequest(params: unknown): ZodValidationResult<DownloadRequest> {
  return validate(downloadRequestSchema, params);
}

export function validateConfigOverrides(data: unknown): ZodValidationResult<ConfigOverrides> {
  return validate(configOverridesSchema, data);
}

export const schemas = {
  mirrorSeed: mirrorSeedSchema,
  mirrorList: mirrorListSchema,
  downloadRequest: downloadRequestSchema,
  configOverrides: configOverridesSchema,
};
