/**
 * @fileoverview Validación y normalización de URLs de mirrors y rutas canónicas.
 * @module validation
 */

import { logger } from './logger';

const log = logger.child('Validation');

/** Acepta solo URLs http(s) absolutas. */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      log.warn('URL rechazada: protocolo no es HTTP(S)', urlString);
      return false;
    }
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.debug(`URL inválida: ${urlString} (${message})`);
    return false;
  }
}

/** Quita espacios y barras finales: `https://a.example/pub/` → `https://a.example/pub`. */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '');
}

/** Quita barras iniciales de la ruta canónica que entrega el catálogo. */
export function normalizeCanonicalPath(canonicalPath: string): string {
  return canonicalPath.trim().replace(/^\/+/, '');
}

/** `{baseUrl}/{canonicalPath}` */
export function buildMirrorUrl(baseUrl: string, canonicalPath: string): string {
  return `${normalizeBaseUrl(baseUrl)}/${normalizeCanonicalPath(canonicalPath)}`;
}

/** Host de una URL para logs; la URL completa si no se puede parsear. */
export function hostOf(urlString: string): string {
  try {
    return new URL(urlString).host;
  } catch {
    return urlString;
  }
}
