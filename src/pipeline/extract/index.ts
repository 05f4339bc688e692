import type { ExtractionPolicy, PipelineConfig } from '../../config.js';
import type { Observation, RawPayload, ValidationResult } from '../types.js';
import { createPatternExtractor } from './pattern.js';
import { createStructuredExtractor } from './structured.js';

export type ExtractorName = 'structured' | 'pattern';

export interface RecordExtractor {
  readonly name: ExtractorName;
  extract(raw: RawPayload, document?: unknown): Observation[];
}

/**
 * `auto` prefiere la consulta estructurada y solo recurre al escaneo por
 * patrones cuando el cuerpo no se pudo interpretar como documento.
 */
export function selectExtractor(
  policy: ExtractionPolicy,
  validation: ValidationResult,
  options: Pick<PipelineConfig, 'collectionPath'>,
): RecordExtractor {
  switch (policy) {
    case 'structured':
      return createStructuredExtractor(options.collectionPath);
    case 'pattern':
      return createPatternExtractor();
    case 'auto':
      return validation.wellFormed
        ? createStructuredExtractor(options.collectionPath)
        : createPatternExtractor();
  }
}

export { createPatternExtractor } from './pattern.js';
export { createStructuredExtractor } from './structured.js';
