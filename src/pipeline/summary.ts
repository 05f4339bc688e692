import { Decimal } from 'decimal.js';

import type { FilteredRecord } from './types.js';

export type SessionSummary = {
  readonly rows: number;
  readonly lastOpen: string | null;
  readonly lastClose: string | null;
  /** (cierre − apertura) / apertura de la última fila. */
  readonly sessionReturn: string | null;
  /** Desviación típica muestral de las dos últimas variaciones de cierre, por √2. */
  readonly volatility: string | null;
};

const SUMMARY_DECIMALS = 6;

const toDecimal = (value: string | null): Decimal | null => {
  if (value === null) {
    return null;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch (_error) {
    return null;
  }
};

const closeChanges = (records: readonly FilteredRecord[]): Decimal[] => {
  const changes: Decimal[] = [];
  let previous: Decimal | null = null;
  for (const record of records) {
    const close = toDecimal(record.close);
    if (close === null) {
      continue;
    }
    if (previous !== null && !previous.isZero()) {
      changes.push(close.minus(previous).dividedBy(previous));
    }
    previous = close;
  }
  return changes;
};

export function computeVolatility(records: readonly FilteredRecord[]): Decimal | null {
  const changes = closeChanges(records);
  if (changes.length < 2) {
    return null;
  }

  const [a, b] = changes.slice(-2);
  if (!a || !b) {
    return null;
  }
  const mean = a.plus(b).dividedBy(2);
  const variance = a.minus(mean).pow(2).plus(b.minus(mean).pow(2));
  return variance.sqrt().times(new Decimal(2).sqrt());
}

export function summarizeSession(records: readonly FilteredRecord[]): SessionSummary {
  const last = records.at(-1);
  const open = toDecimal(last?.open ?? null);
  const close = toDecimal(last?.close ?? null);

  const sessionReturn =
    open !== null && close !== null && !open.isZero() ? close.minus(open).dividedBy(open) : null;
  const volatility = computeVolatility(records);

  return {
    rows: records.length,
    lastOpen: last?.open ?? null,
    lastClose: last?.close ?? null,
    sessionReturn: sessionReturn?.toDecimalPlaces(SUMMARY_DECIMALS).toString() ?? null,
    volatility: volatility?.toDecimalPlaces(SUMMARY_DECIMALS).toString() ?? null,
  };
}
