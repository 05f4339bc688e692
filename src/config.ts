export const BOURSEDIRECT_INTRADAY_URL =
  'https://www.boursedirect.fr/api/instrument/intraday/XPAR/PX1/EUR' as const;

// Sin este User-Agent el proveedor responde con un 403.
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:129.0) Gecko/20100101 Firefox/129.0' as const;

export const ACCESS_DENIED_MARKER = '403 Forbidden' as const;

export const SESSION_CLOSE_HHMM = 1730;

export const MARKET_TZ = 'Europe/Paris' as const;

export const PAYLOAD_FIELDS = {
  timestamp: 'Date',
  open: 'OpenPrice',
  close: 'ClosePrice',
  high: 'High',
  low: 'Low',
} as const;

export type PayloadField = keyof typeof PAYLOAD_FIELDS;

export const TABLE_COLUMNS = ['Date', 'OpenPrice', 'ClosePrice', 'High', 'Low'] as const;

export const VARIANT_NAMES = ['intraday', 'intraday-ms', 'history'] as const;
export type VariantName = (typeof VARIANT_NAMES)[number];

export const EXTRACTION_POLICIES = ['structured', 'pattern', 'auto'] as const;
export type ExtractionPolicy = (typeof EXTRACTION_POLICIES)[number];

export const TIMESTAMP_UNITS = ['s', 'ms'] as const;
export type TimestampUnit = (typeof TIMESTAMP_UNITS)[number];

export const DATE_FORMATS = ['datetime', 'date'] as const;
export type DateFormat = (typeof DATE_FORMATS)[number];

export const DELIMITERS = [', ', ','] as const;
export type Delimiter = (typeof DELIMITERS)[number];

export interface PipelineConfig {
  readonly variant: VariantName;
  readonly endpointUrl: string;
  readonly userAgent: string;
  readonly accessDeniedMarker: string;
  readonly extraction: ExtractionPolicy;
  /** Falla con MalformedPayloadError si el cuerpo no es JSON con colección de entradas. */
  readonly requireWellFormed: boolean;
  /** Ruta con puntos hasta el arreglo de entradas, p. ej. `current`. Vacía: el documento raíz. */
  readonly collectionPath: string;
  readonly timestampUnit: TimestampUnit;
  readonly timezone: string;
  /** `null` desactiva el filtro de sesión. */
  readonly sessionCutoffHHMM: number | null;
  readonly cutoffInclusive: boolean;
  readonly dateFormat: DateFormat;
  readonly delimiter: Delimiter;
  readonly outDir: string;
  readonly rawFile: string;
  readonly tableFile: string;
  readonly activityLogFile: string | null;
}

const BASE_CONFIG = {
  endpointUrl: BOURSEDIRECT_INTRADAY_URL,
  userAgent: BROWSER_USER_AGENT,
  accessDeniedMarker: ACCESS_DENIED_MARKER,
  collectionPath: 'current',
  timezone: MARKET_TZ,
  outDir: '.',
  rawFile: 'raw_data.json',
  tableFile: 'data_output.csv',
} as const;

export const VARIANTS: Readonly<Record<VariantName, PipelineConfig>> = Object.freeze({
  intraday: {
    ...BASE_CONFIG,
    variant: 'intraday',
    extraction: 'auto',
    requireWellFormed: false,
    timestampUnit: 's',
    sessionCutoffHHMM: SESSION_CLOSE_HHMM,
    cutoffInclusive: true,
    dateFormat: 'datetime',
    delimiter: ', ',
    activityLogFile: null,
  },
  'intraday-ms': {
    ...BASE_CONFIG,
    variant: 'intraday-ms',
    extraction: 'pattern',
    requireWellFormed: false,
    timestampUnit: 'ms',
    sessionCutoffHHMM: null,
    cutoffInclusive: true,
    dateFormat: 'datetime',
    delimiter: ', ',
    activityLogFile: null,
  },
  history: {
    ...BASE_CONFIG,
    variant: 'history',
    extraction: 'structured',
    requireWellFormed: true,
    timestampUnit: 's',
    sessionCutoffHHMM: SESSION_CLOSE_HHMM,
    cutoffInclusive: false,
    dateFormat: 'date',
    delimiter: ',',
    rawFile: 'raw_history.json',
    tableFile: 'history_output.csv',
    activityLogFile: 'scrape_history.log',
  },
} satisfies Record<VariantName, PipelineConfig>);

export const DEFAULT_VARIANT: VariantName = 'intraday';
