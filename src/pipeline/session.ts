import { DateTime } from 'luxon';

import type { DateFormat, PipelineConfig, TimestampUnit } from '../config.js';
import type { FilteredRecord, Observation } from './types.js';

export type SessionWindow = Pick<
  PipelineConfig,
  'timestampUnit' | 'timezone' | 'sessionCutoffHHMM' | 'cutoffInclusive' | 'dateFormat'
>;

const DATE_PATTERNS: Record<DateFormat, string> = {
  datetime: 'yyyy-MM-dd HH:mm:ss',
  date: 'yyyy-MM-dd',
};

export function toLocalDateTime(epoch: number, unit: TimestampUnit, zone: string): DateTime {
  const millis = unit === 's' ? epoch * 1_000 : epoch;
  return DateTime.fromMillis(millis, { zone });
}

/** Hora local como entero HHMM, p. ej. 17:29 → 1729. */
export function toHHMM(local: DateTime): number {
  return local.hour * 100 + local.minute;
}

export function isWithinSession(hhmm: number, cutoff: number | null, inclusive: boolean): boolean {
  if (cutoff === null) {
    return true;
  }
  return inclusive ? hhmm <= cutoff : hhmm < cutoff;
}

export function filterObservation(observation: Observation, window: SessionWindow): FilteredRecord | null {
  const local = toLocalDateTime(observation.timestampEpoch, window.timestampUnit, window.timezone);
  if (!local.isValid) {
    return null;
  }

  if (!isWithinSession(toHHMM(local), window.sessionCutoffHHMM, window.cutoffInclusive)) {
    return null;
  }

  return {
    date: local.toFormat(DATE_PATTERNS[window.dateFormat]),
    open: observation.open,
    close: observation.close,
    high: observation.high,
    low: observation.low,
  };
}

export function filterSession(observations: readonly Observation[], window: SessionWindow): FilteredRecord[] {
  const records: FilteredRecord[] = [];
  for (const observation of observations) {
    const record = filterObservation(observation, window);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
