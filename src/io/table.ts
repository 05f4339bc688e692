import { stat } from 'node:fs/promises';

import { TABLE_COLUMNS, type Delimiter } from '../config.js';
import type { FilteredRecord } from '../pipeline/types.js';
import { writeFileAtomic } from './artifacts.js';

export function formatHeader(delimiter: Delimiter): string {
  return TABLE_COLUMNS.join(delimiter);
}

// Los precios se escriben tal como llegaron; los ausentes quedan como campo vacío.
export function formatRow(record: FilteredRecord, delimiter: Delimiter): string {
  return [record.date, record.open, record.close ?? '', record.high ?? '', record.low ?? ''].join(delimiter);
}

export function renderTable(records: readonly FilteredRecord[], delimiter: Delimiter): string {
  const lines = [formatHeader(delimiter), ...records.map((record) => formatRow(record, delimiter))];
  return `${lines.join('\n')}\n`;
}

export async function writeTable(
  filePath: string,
  records: readonly FilteredRecord[],
  delimiter: Delimiter,
): Promise<void> {
  await writeFileAtomic(filePath, renderTable(records, delimiter));
}

export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
