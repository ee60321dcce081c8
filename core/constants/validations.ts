/**
 * @fileoverview Mensajes de validación usados por los schemas Zod.
 * @module constants/validations
 */

export const VALIDATIONS = {
  MIRROR: {
    NAME_EMPTY: 'El nombre del mirror no puede estar vacío',
    NAME_TOO_LONG: 'El nombre del mirror es demasiado largo',
    URL_INVALID: 'La URL base debe ser http(s) válida',
    PRIORITY_INTEGER: 'La prioridad debe ser un número entero',
    HEALTH_RANGE: 'La salud debe estar entre 0 y 1',
    LIST_EMPTY: 'La lista de mirrors no puede estar vacía',
  },
  REQUEST: {
    IDENTIFIER_EMPTY: 'El identificador no puede estar vacío',
    DESTINATION_EMPTY: 'La ruta de destino no puede estar vacía',
    SIZE_NON_NEGATIVE: 'El tamaño esperado no puede ser negativo',
    PRIORITY_INTEGER: 'La prioridad debe ser un número entero',
    INVALID: 'Petición de descarga inválida',
  },
  CONFIG: {
    POSITIVE: 'Debe ser un número positivo',
    CONCURRENCY_RANGE: 'La concurrencia debe estar entre 1 y 64',
    FRACTION: 'Debe estar entre 0 y 1',
    COUNTRY_CODE: 'Código de país inválido',
  },
  GENERIC: {
    VALIDATION_ERROR: 'Error de validación',
  },
} as const;
