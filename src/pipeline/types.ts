/** Cuerpo de la respuesta tal cual llega; nunca se modifica. */
export type RawPayload = string;

/**
 * Observación extraída del payload. Los precios se guardan como texto para
 * volcarlos a la tabla sin reformatear.
 */
export type Observation = {
  readonly timestampEpoch: number;
  readonly open: string;
  readonly close: string | null;
  readonly high: string | null;
  readonly low: string | null;
};

export type FilteredRecord = {
  readonly date: string;
  readonly open: string;
  readonly close: string | null;
  readonly high: string | null;
  readonly low: string | null;
};

export type TransportResponse = {
  readonly url: string;
  readonly status: number;
  /** Bytes exactos recibidos; es lo que se guarda como copia cruda. */
  readonly bytes: Buffer;
  /** Los mismos bytes decodificados como UTF-8, con BOM incluido. */
  readonly body: RawPayload;
};

export type ValidationResult = {
  readonly wellFormed: boolean;
  readonly document?: unknown;
};
