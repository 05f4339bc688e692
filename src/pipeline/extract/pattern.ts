import { PAYLOAD_FIELDS, type PayloadField } from '../../config.js';
import type { Observation, RawPayload } from '../types.js';
import type { RecordExtractor } from './index.js';

type ValueField = Exclude<PayloadField, 'timestamp'>;

const VALUE_FIELDS: readonly ValueField[] = ['open', 'close', 'high', 'low'];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const TIMESTAMP_PATTERN = new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.timestamp)}":\\s*([0-9]+)`, 'g');

const VALUE_PATTERNS: Readonly<Record<ValueField, RegExp>> = {
  open: new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.open)}":\\s*([0-9.]+)`),
  close: new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.close)}":\\s*([0-9.]+)`),
  high: new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.high)}":\\s*([0-9.]+)`),
  low: new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.low)}":\\s*([0-9.]+)`),
};

/** Marcas de tiempo en orden de aparición, con duplicados. */
export function scanTimestamps(raw: RawPayload): string[] {
  return Array.from(raw.matchAll(TIMESTAMP_PATTERN), (match) => match[1] ?? '').filter(
    (value) => value.length > 0,
  );
}

/**
 * Valor más cercano de `field` tras la primera aparición de `"Date": <timestamp>,`.
 * No se limita a la entrada de esa marca: si falta en ella, toma el de la siguiente.
 */
export function scanFollowingValue(raw: RawPayload, timestamp: string, field: ValueField): string | null {
  const anchor = new RegExp(`"${escapeRegExp(PAYLOAD_FIELDS.timestamp)}":\\s*${timestamp},`);
  const anchorMatch = anchor.exec(raw);
  if (!anchorMatch) {
    return null;
  }

  const tail = raw.slice(anchorMatch.index + anchorMatch[0].length);
  const valueMatch = VALUE_PATTERNS[field].exec(tail);
  const value = valueMatch?.[1];
  return value && value.length > 0 ? value : null;
}

export function createPatternExtractor(): RecordExtractor {
  return {
    name: 'pattern',
    extract(raw: RawPayload): Observation[] {
      const observations: Observation[] = [];

      for (const timestamp of scanTimestamps(raw)) {
        const values: Partial<Record<ValueField, string>> = {};
        for (const field of VALUE_FIELDS) {
          const value = scanFollowingValue(raw, timestamp, field);
          if (value === null) {
            break;
          }
          values[field] = value;
        }

        const { open, close, high, low } = values;
        if (open === undefined || close === undefined || high === undefined || low === undefined) {
          continue;
        }

        observations.push({ timestampEpoch: Number(timestamp), open, close, high, low });
      }

      return observations;
    },
  };
}
