/**
 * @fileoverview Textos de error del motor de descargas.
 * @module constants/errors
 *
 * Fuente única de verdad para los mensajes que llegan al llamador en los resultados
 * de lote y en TransferError.
 */

// =====================
// ERRORES DE TRANSFERENCIA
// =====================

export const TRANSFER_ERRORS = {
  NOT_FOUND: 'Recurso no encontrado en el mirror',
  SERVER_ERROR: 'Error del servidor',
  HTTP_ERROR: 'Respuesta HTTP inesperada',
  RATE_LIMITED: 'El servidor pidió reducir la frecuencia de peticiones',
  TIMEOUT: 'Timeout de red',
  CONNECTION: 'Error de conexión',
  STREAM_INTERRUPTED: 'Conexión interrumpida durante la transferencia',
  CANCELLED: 'Transferencia cancelada',
  TOO_MANY_REDIRECTS: 'Demasiadas redirecciones',
  SIZE_EXCEEDED: 'El servidor envió más bytes de los esperados',
  SIZE_MISMATCH: 'El tamaño final no coincide con el esperado',
  STALE_PARTIAL: 'El archivo parcial no corresponde al recurso remoto',
  FILESYSTEM: 'Error del sistema de archivos',
  INVALID_URL: 'URL inválida',
} as const;

// =====================
// ERRORES DE TAREA / LOTE
// =====================

export const TASK_ERRORS = {
  EXHAUSTED: 'No quedan mirrors elegibles para este identificador',
  MAX_ATTEMPTS: 'Se alcanzó el máximo de intentos para la tarea',
  UNRESOLVED: 'El catálogo no devolvió ruta para el identificador',
  BATCH_ABORTED: 'Lote abortado por un error fatal en otra tarea',
  CANCELLED: 'Lote cancelado antes de iniciar la tarea',
  WORKER_CRASHED: 'Error inesperado ejecutando la tarea',
} as const;

// =====================
// ERRORES DE REGISTRO / CONFIGURACIÓN
// =====================

export const REGISTRY_ERRORS = {
  UNKNOWN_MIRROR: 'Mirror no registrado',
  DUPLICATE_MIRROR: 'Ya existe un mirror con esa URL base',
  STORE_NOT_INITIALIZED: 'El almacén de mirrors no está inicializado',
  SEED_INVALID: 'Lista de mirrors inválida',
} as const;

export const CONFIG_ERRORS = {
  INVALID_FILE: 'Archivo de configuración inválido',
  INVALID_ENV: 'Variables de entorno de configuración inválidas',
  INVALID_OVERRIDES: 'Parámetros de configuración inválidos',
} as const;
