import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { test } from 'node:test';

import { formatHeader, formatRow, isNonEmptyFile, renderTable, writeTable } from '../src/io/table.js';
import type { FilteredRecord } from '../src/pipeline/types.js';
import { createTempDir } from './helpers/payloads.js';

const records: FilteredRecord[] = [
  { date: '2024-01-15 09:00:00', open: '7400.50', close: '7401.25', high: '7402', low: '7398.5' },
  { date: '2024-01-15 09:05:00', open: '7401.25', close: null, high: null, low: null },
];

test('headers follow the configured delimiter', () => {
  assert.equal(formatHeader(', '), 'Date, OpenPrice, ClosePrice, High, Low');
  assert.equal(formatHeader(','), 'Date,OpenPrice,ClosePrice,High,Low');
});

test('rows keep prices verbatim and leave missing values empty', () => {
  assert.equal(formatRow(records[0], ', '), '2024-01-15 09:00:00, 7400.50, 7401.25, 7402, 7398.5');
  assert.equal(formatRow(records[1], ','), '2024-01-15 09:05:00,7401.25,,,');
});

test('writeTable overwrites earlier output in extraction order', async () => {
  const dir = createTempDir('px1-table-');
  const filePath = path.join(dir, 'nested', 'data_output.csv');

  await writeTable(filePath, [records[1]], ',');
  await writeTable(filePath, records, ',');

  assert.equal(
    fs.readFileSync(filePath, 'utf8'),
    [
      'Date,OpenPrice,ClosePrice,High,Low',
      '2024-01-15 09:00:00,7400.50,7401.25,7402,7398.5',
      '2024-01-15 09:05:00,7401.25,,,',
      '',
    ].join('\n'),
  );
  assert.deepEqual(
    fs.readdirSync(path.dirname(filePath)),
    ['data_output.csv'],
  );
});

test('an empty record list still produces the header line', async () => {
  assert.equal(renderTable([], ', '), 'Date, OpenPrice, ClosePrice, High, Low\n');

  const dir = createTempDir('px1-table-empty-');
  const filePath = path.join(dir, 'data_output.csv');
  await writeTable(filePath, [], ', ');
  assert.equal(await isNonEmptyFile(filePath), true);
});

test('isNonEmptyFile reports missing and empty files as false', async () => {
  const dir = createTempDir('px1-table-missing-');
  assert.equal(await isNonEmptyFile(path.join(dir, 'missing.csv')), false);

  const emptyPath = path.join(dir, 'empty.csv');
  fs.writeFileSync(emptyPath, '');
  assert.equal(await isNonEmptyFile(emptyPath), false);
});
