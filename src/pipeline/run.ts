import type { PipelineConfig } from '../config.js';
import type { ActivityLog } from '../bootstrap/logger.js';
import { writeRawArtifact } from '../io/artifacts.js';
import { resolveArtifactPath } from '../io/dir.js';
import { isNonEmptyFile, writeTable } from '../io/table.js';
import { selectExtractor, type ExtractorName } from './extract/index.js';
import { filterSession } from './session.js';
import { summarizeSession, type SessionSummary } from './summary.js';
import { fetchRawPayload, type FetchLike } from './transport.js';
import { validateResponse } from './validate.js';

export type RunDependencies = {
  readonly log: ActivityLog;
  readonly fetchImpl?: FetchLike;
};

export type RunResult = {
  readonly strategy: ExtractorName;
  readonly extracted: number;
  readonly kept: number;
  readonly dropped: number;
  readonly rawPath: string;
  readonly tablePath: string;
  readonly tableNonEmpty: boolean;
  readonly summary: SessionSummary;
};

export type ArtifactPaths = {
  readonly rawPath: string;
  readonly tablePath: string;
};

export function resolveArtifacts(config: Pick<PipelineConfig, 'outDir' | 'rawFile' | 'tableFile'>): ArtifactPaths {
  return {
    rawPath: resolveArtifactPath(config.outDir, config.rawFile),
    tablePath: resolveArtifactPath(config.outDir, config.tableFile),
  };
}

/**
 * Una ejecución completa: petición, copia cruda, validación, extracción,
 * filtro de sesión y tabla. Los errores fatales se propagan sin tocar la tabla.
 */
export async function runPipeline(config: PipelineConfig, deps: RunDependencies): Promise<RunResult> {
  const { log } = deps;
  const { rawPath, tablePath } = resolveArtifacts(config);

  log.info(`Inicio de la extracción (${config.variant}): ${config.endpointUrl}`);
  const response = await fetchRawPayload(config, deps.fetchImpl);
  log.info(`Respuesta recibida: HTTP ${response.status}, ${response.bytes.length} bytes.`);

  await writeRawArtifact(rawPath, response.bytes);
  log.info(`Datos crudos guardados en ${rawPath}.`);

  const validation = validateResponse(response, config);
  const extractor = selectExtractor(config.extraction, validation, config);
  log.info(`Extracción con la estrategia "${extractor.name}" (política ${config.extraction}).`);

  const observations = extractor.extract(response.body, validation.document);
  const records = filterSession(observations, config);
  const dropped = observations.length - records.length;
  log.info(`${observations.length} observaciones extraídas, ${records.length} dentro de la sesión, ${dropped} descartadas.`);

  await writeTable(tablePath, records, config.delimiter);
  log.info(`Los datos se guardaron en ${tablePath}.`);

  const tableNonEmpty = await isNonEmptyFile(tablePath);
  if (tableNonEmpty) {
    log.info('Extracción completada con éxito.');
  } else {
    log.error(`Fallo: ${tablePath} está vacío o no existe.`);
  }
  if (records.length === 0) {
    log.warn('La tabla solo contiene la cabecera: ninguna observación superó el filtro.');
  }

  const summary = summarizeSession(records);
  if (summary.rows > 0) {
    log.info(
      `Resumen: apertura ${summary.lastOpen ?? '-'}, cierre ${summary.lastClose ?? '-'}, rendimiento ${summary.sessionReturn ?? '-'}, volatilidad ${summary.volatility ?? '-'}.`,
    );
  }

  return {
    strategy: extractor.name,
    extracted: observations.length,
    kept: records.length,
    dropped,
    rawPath,
    tablePath,
    tableNonEmpty,
    summary,
  };
}
