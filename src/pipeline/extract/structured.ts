import { z } from 'zod';

import { PAYLOAD_FIELDS } from '../../config.js';
import { resolveCollection } from '../../utils/payload.js';
import type { Observation, RawPayload } from '../types.js';
import type { RecordExtractor } from './index.js';

const NumericLike = z.union([z.number().finite(), z.string().trim().min(1)]).nullish();

// Cierre, máximo y mínimo no deciden si la entrada se conserva: un valor raro queda vacío.
const LenientNumeric = NumericLike.catch(null);

const EntrySchema = z.object({
  [PAYLOAD_FIELDS.timestamp]: NumericLike,
  [PAYLOAD_FIELDS.open]: NumericLike,
  [PAYLOAD_FIELDS.close]: LenientNumeric,
  [PAYLOAD_FIELDS.high]: LenientNumeric,
  [PAYLOAD_FIELDS.low]: LenientNumeric,
});

type NumericValue = z.infer<typeof NumericLike>;

const toText = (value: NumericValue): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === 'number' ? String(value) : value;
};

const toEpoch = (value: NumericValue): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isSafeInteger(numeric) ? numeric : null;
};

export function projectEntry(entry: unknown): Observation | null {
  const parsed = EntrySchema.safeParse(entry);
  if (!parsed.success) {
    return null;
  }

  const fields = parsed.data;
  const timestampEpoch = toEpoch(fields[PAYLOAD_FIELDS.timestamp]);
  const open = toText(fields[PAYLOAD_FIELDS.open]);
  if (timestampEpoch === null || open === null) {
    return null;
  }

  return {
    timestampEpoch,
    open,
    close: toText(fields[PAYLOAD_FIELDS.close]),
    high: toText(fields[PAYLOAD_FIELDS.high]),
    low: toText(fields[PAYLOAD_FIELDS.low]),
  };
}

export function createStructuredExtractor(collectionPath: string): RecordExtractor {
  return {
    name: 'structured',
    extract(_raw: RawPayload, document?: unknown): Observation[] {
      const entries = resolveCollection(document, collectionPath);
      if (!entries) {
        return [];
      }

      const observations: Observation[] = [];
      for (const entry of entries) {
        const observation = projectEntry(entry);
        if (observation) {
          observations.push(observation);
        }
      }
      return observations;
    },
  };
}
