import { promises as fs } from 'node:fs';

import { IANAZone } from 'luxon';
import { parse } from 'yaml';
import { z } from 'zod';

import {
  DATE_FORMATS,
  DEFAULT_VARIANT,
  DELIMITERS,
  EXTRACTION_POLICIES,
  TIMESTAMP_UNITS,
  VARIANTS,
  VARIANT_NAMES,
  type PipelineConfig,
  type VariantName,
} from '../config.js';
import { ConfigError } from './errors.js';

const BooleanLikeSchema = z.preprocess((value) => {
  if (typeof value === 'number') {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false;
    }
  }
  return value;
}, z.boolean());

// `none`, `off` o `null` desactivan el filtro de sesión.
const CutoffSchema = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['none', 'off', 'null', ''].includes(normalized)) {
      return null;
    }
    return Number(normalized.replace(':', ''));
  }
  return value;
}, z.number().int().min(0).max(2359).refine((value) => value % 100 < 60, 'Minutos fuera de rango.').nullable());

const NonEmptyString = z.string().trim().min(1, 'Debe proporcionar un valor.');

const TimezoneSchema = NonEmptyString.refine(
  (zone) => zone.toLowerCase() === 'local' || IANAZone.isValidZone(zone),
  'Zona horaria IANA desconocida.',
);

export const PipelineOverridesSchema = z
  .object({
    variant: z.enum(VARIANT_NAMES),
    endpointUrl: z.string().trim().url(),
    userAgent: NonEmptyString,
    accessDeniedMarker: NonEmptyString,
    extraction: z.enum(EXTRACTION_POLICIES),
    requireWellFormed: BooleanLikeSchema,
    collectionPath: z.string().trim(),
    timestampUnit: z.enum(TIMESTAMP_UNITS),
    timezone: TimezoneSchema,
    sessionCutoffHHMM: CutoffSchema,
    cutoffInclusive: BooleanLikeSchema,
    dateFormat: z.enum(DATE_FORMATS),
    delimiter: z.enum(DELIMITERS),
    outDir: NonEmptyString,
    rawFile: NonEmptyString,
    tableFile: NonEmptyString,
    activityLogFile: NonEmptyString.nullable(),
  })
  .partial()
  .strict();

export type PipelineOverrides = z.output<typeof PipelineOverridesSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<raíz>'}: ${issue.message}`).join('; ');

export function parseOverrides(input: unknown, source: string): PipelineOverrides {
  const result = PipelineOverridesSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(`Configuración inválida en ${source}: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export async function loadConfigFile(filePath: string): Promise<PipelineOverrides> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`No se pudo leer el archivo de configuración ${filePath}.`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    throw new ConfigError(`El archivo ${filePath} no es YAML válido.`, { cause: error });
  }

  return parseOverrides(parsed, filePath);
}

export const ENV_MAPPING: Readonly<Record<keyof PipelineOverrides, string>> = {
  variant: 'PX1_VARIANT',
  endpointUrl: 'PX1_ENDPOINT_URL',
  userAgent: 'PX1_USER_AGENT',
  accessDeniedMarker: 'PX1_ACCESS_DENIED_MARKER',
  extraction: 'PX1_EXTRACTION',
  requireWellFormed: 'PX1_REQUIRE_WELL_FORMED',
  collectionPath: 'PX1_COLLECTION_PATH',
  timestampUnit: 'PX1_TIMESTAMP_UNIT',
  timezone: 'PX1_TIMEZONE',
  sessionCutoffHHMM: 'PX1_SESSION_CUTOFF',
  cutoffInclusive: 'PX1_CUTOFF_INCLUSIVE',
  dateFormat: 'PX1_DATE_FORMAT',
  delimiter: 'PX1_DELIMITER',
  outDir: 'PX1_OUT_DIR',
  rawFile: 'PX1_RAW_FILE',
  tableFile: 'PX1_TABLE_FILE',
  activityLogFile: 'PX1_ACTIVITY_LOG_FILE',
};

export function overridesFromEnv(env: NodeJS.ProcessEnv): PipelineOverrides {
  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_MAPPING)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return parseOverrides(raw, 'variables de entorno');
}

/** Precedencia de derecha a izquierda; los `undefined` no pisan valores. */
export function mergeOverrides(...layers: readonly PipelineOverrides[]): PipelineOverrides {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return parseOverrides(merged, 'configuración combinada');
}

export type ResolveConfigInput = {
  readonly file?: PipelineOverrides;
  readonly env?: PipelineOverrides;
  readonly cli?: PipelineOverrides;
};

/**
 * Parte del preset de la variante elegida (la última capa que la nombre gana)
 * y aplica encima archivo, entorno y CLI.
 */
export function resolvePipelineConfig(input: ResolveConfigInput = {}): PipelineConfig {
  const layers = [input.file ?? {}, input.env ?? {}, input.cli ?? {}];
  const merged = mergeOverrides(...layers);
  const variant: VariantName = merged.variant ?? DEFAULT_VARIANT;
  const preset = VARIANTS[variant];

  return {
    variant,
    endpointUrl: merged.endpointUrl ?? preset.endpointUrl,
    userAgent: merged.userAgent ?? preset.userAgent,
    accessDeniedMarker: merged.accessDeniedMarker ?? preset.accessDeniedMarker,
    extraction: merged.extraction ?? preset.extraction,
    requireWellFormed: merged.requireWellFormed ?? preset.requireWellFormed,
    collectionPath: merged.collectionPath ?? preset.collectionPath,
    timestampUnit: merged.timestampUnit ?? preset.timestampUnit,
    timezone: merged.timezone ?? preset.timezone,
    sessionCutoffHHMM: merged.sessionCutoffHHMM === undefined ? preset.sessionCutoffHHMM : merged.sessionCutoffHHMM,
    cutoffInclusive: merged.cutoffInclusive ?? preset.cutoffInclusive,
    dateFormat: merged.dateFormat ?? preset.dateFormat,
    delimiter: merged.delimiter ?? preset.delimiter,
    outDir: merged.outDir ?? preset.outDir,
    rawFile: merged.rawFile ?? preset.rawFile,
    tableFile: merged.tableFile ?? preset.tableFile,
    activityLogFile: merged.activityLogFile === undefined ? preset.activityLogFile : merged.activityLogFile,
  };
}
