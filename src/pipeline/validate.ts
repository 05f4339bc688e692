import type { PipelineConfig } from '../config.js';
import { looksLikeJson, resolveCollection, safeJsonParse } from '../utils/payload.js';
import { AccessDeniedError, MalformedPayloadError } from './errors.js';
import type { TransportResponse, ValidationResult } from './types.js';

type ValidationOptions = Pick<PipelineConfig, 'accessDeniedMarker' | 'requireWellFormed' | 'collectionPath'>;

export function isAccessDenied(body: string, marker: string): boolean {
  return marker.length > 0 && body.includes(marker);
}

/**
 * Orden fijo: rechazo de acceso, parseo JSON y, si se exige, estructura.
 * El cuerpo crudo ya debe estar persistido antes de llamar aquí.
 */
export function validateResponse(response: TransportResponse, options: ValidationOptions): ValidationResult {
  const { body } = response;

  if (isAccessDenied(body, options.accessDeniedMarker)) {
    throw new AccessDeniedError(response.status);
  }

  const document = looksLikeJson(body) ? safeJsonParse(body) : undefined;
  const collection = document === undefined ? undefined : resolveCollection(document, options.collectionPath);
  const wellFormed = collection !== undefined;

  if (options.requireWellFormed && !wellFormed) {
    if (document === undefined) {
      throw new MalformedPayloadError('el cuerpo no es JSON válido.');
    }
    const where = options.collectionPath.trim() || '<raíz>';
    throw new MalformedPayloadError(`no se encontró el arreglo de entradas en "${where}".`);
  }

  return document === undefined ? { wellFormed } : { wellFormed, document };
}
