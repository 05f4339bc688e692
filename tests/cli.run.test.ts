import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { describe, it } from 'node:test';

import { CommanderError } from 'commander';

import { createActivityLog } from '../src/bootstrap/logger.js';
import { buildProgram } from '../src/cli/index.js';
import { buildCliOverrides, executeRun } from '../src/cli/commands/run.js';
import type { CommandContext } from '../src/cli/commands/shared.js';
import { describeVariant } from '../src/cli/commands/variants.js';
import { VARIANTS } from '../src/config.js';
import type { FetchLike } from '../src/pipeline/transport.js';
import { createTempDir, entryAt, intradayBody, stubFetch } from './helpers/payloads.js';

const contextFor = (env: NodeJS.ProcessEnv, fetchImpl: FetchLike): CommandContext => ({
  resolveGlobals: () => ({ json: true }),
  env,
  fetchImpl,
  createLog: createActivityLog,
});

const stripTimestamp = (line: string): string => line.replace(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] /, '');

describe('run command', () => {
  it('maps flags to configuration overrides', () => {
    assert.deepEqual(
      buildCliOverrides({ variant: 'history', cutoff: '1700', exclusiveCutoff: true, extraction: 'pattern' }),
      { variant: 'history', sessionCutoffHHMM: 1700, cutoffInclusive: false, extraction: 'pattern' },
    );
    assert.deepEqual(buildCliOverrides({ cutoff: 'none', inclusiveCutoff: true }), {
      sessionCutoffHHMM: null,
      cutoffInclusive: true,
    });
  });

  it('rejects exclusive and inclusive cutoff flags together', async () => {
    const program = buildProgram({ fetchImpl: stubFetch('{}') });
    for (const command of [program, ...program.commands]) {
      command.configureOutput({ writeErr: () => {}, writeOut: () => {} });
    }

    await assert.rejects(
      program.parseAsync(['node', 'px1-intraday', 'run', '--exclusive-cutoff', '--inclusive-cutoff']),
      (error: unknown) => {
        assert.ok(error instanceof CommanderError);
        assert.equal(error.code, 'commander.conflictingOption');
        assert.equal(error.exitCode, 1);
        return true;
      },
    );
  });

  it('exits 0 and appends the history activity log', async (t) => {
    t.mock.method(console, 'log', () => {});
    const outDir = createTempDir('px1-cli-history-');
    const body = intradayBody([entryAt(9, 0)]);

    const code = await executeRun({ variant: 'history', outDir }, { json: true }, contextFor({}, stubFetch(body)));

    assert.equal(code, 0);
    const lines = fs
      .readFileSync(path.join(outDir, 'scrape_history.log'), 'utf8')
      .trimEnd()
      .split('\n')
      .map(stripTimestamp);
    assert.ok(lines.includes('Extracción completada con éxito.'));
    assert.equal(
      fs.readFileSync(path.join(outDir, 'history_output.csv'), 'utf8'),
      'Date,OpenPrice,ClosePrice,High,Low\n2024-01-15,7400.5,7401.25,7402,7398.5\n',
    );
  });

  it('exits 1 and logs the diagnostic on access denial', async (t) => {
    const errors = t.mock.method(console, 'error', () => {});
    const outDir = createTempDir('px1-cli-403-');

    const code = await executeRun(
      { variant: 'history' },
      { json: true },
      contextFor({ PX1_OUT_DIR: outDir }, stubFetch('403 Forbidden', 403)),
    );

    assert.equal(code, 1);
    const lines = fs.readFileSync(path.join(outDir, 'scrape_history.log'), 'utf8').trimEnd().split('\n');
    assert.equal(
      stripTimestamp(lines[lines.length - 1] ?? ''),
      'Error 403: acceso prohibido a la API. Revisa los permisos o las cabeceras de la petición.',
    );
    assert.equal(errors.mock.callCount(), 1);
    assert.equal(fs.existsSync(path.join(outDir, 'history_output.csv')), false);
  });

  it('exits 1 on invalid configuration before any request', async (t) => {
    t.mock.method(console, 'error', () => {});
    let requested = false;
    const fetchImpl: FetchLike = async () => {
      requested = true;
      return new Response('');
    };

    const code = await executeRun({ cutoff: 'later' }, { json: true }, contextFor({}, fetchImpl));

    assert.equal(code, 1);
    assert.equal(requested, false);
  });
});

describe('variants command', () => {
  it('describes each preset on one line', () => {
    assert.equal(
      describeVariant(VARIANTS.intraday),
      '- intraday (por defecto): extraction=auto unit=s cutoff=<= 1730 date=datetime table=data_output.csv log=consola',
    );
    assert.equal(
      describeVariant(VARIANTS['intraday-ms']),
      '- intraday-ms: extraction=pattern unit=ms cutoff=sin filtro date=datetime table=data_output.csv log=consola',
    );
    assert.equal(
      describeVariant(VARIANTS.history),
      '- history: extraction=structured unit=s cutoff=< 1730 date=date table=history_output.csv log=scrape_history.log',
    );
  });
});
