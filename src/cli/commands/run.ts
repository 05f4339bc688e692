import process from 'node:process';

import { Option, type Command } from 'commander';

import { readRuntimeEnv } from '../../bootstrap/env.js';
import { resolveArtifactPath } from '../../io/dir.js';
import { isPipelineError } from '../../pipeline/errors.js';
import { runPipeline, type RunResult } from '../../pipeline/run.js';
import {
  loadConfigFile,
  overridesFromEnv,
  parseOverrides,
  resolvePipelineConfig,
  type PipelineOverrides,
} from '../../pipeline/settings.js';
import type { PipelineConfig } from '../../config.js';
import { resolveEnv } from './shared.js';
import type { CommandContext, GlobalOptions } from './shared.js';

export type RunOptions = {
  variant?: string;
  config?: string;
  outDir?: string;
  extraction?: string;
  cutoff?: string;
  exclusiveCutoff?: boolean;
  inclusiveCutoff?: boolean;
  timezone?: string;
};

export function buildCliOverrides(options: RunOptions): PipelineOverrides {
  const overrides: Record<string, unknown> = {};

  if (options.variant !== undefined) {
    overrides.variant = options.variant;
  }
  if (options.outDir !== undefined) {
    overrides.outDir = options.outDir;
  }
  if (options.extraction !== undefined) {
    overrides.extraction = options.extraction;
  }
  if (options.cutoff !== undefined) {
    overrides.sessionCutoffHHMM = options.cutoff;
  }
  if (options.exclusiveCutoff) {
    overrides.cutoffInclusive = false;
  } else if (options.inclusiveCutoff) {
    overrides.cutoffInclusive = true;
  }
  if (options.timezone !== undefined) {
    overrides.timezone = options.timezone;
  }

  return parseOverrides(overrides, 'argumentos de la CLI');
}

export async function resolveRunConfig(options: RunOptions, context: CommandContext): Promise<PipelineConfig> {
  const env = resolveEnv(context);
  const runtime = readRuntimeEnv(env);
  const configPath = options.config ?? runtime.configPath;

  return resolvePipelineConfig({
    file: configPath ? await loadConfigFile(configPath) : undefined,
    env: overridesFromEnv(env),
    cli: buildCliOverrides(options),
  });
}

function printResult(globals: GlobalOptions, result: RunResult): void {
  if (globals.json) {
    console.log(JSON.stringify({ status: 'ok', ...result }, null, 2));
    return;
  }
  console.log(`${result.kept} filas escritas en ${result.tablePath} (estrategia ${result.strategy}).`);
}

function printFailure(globals: GlobalOptions, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  if (globals.json) {
    const code = isPipelineError(error) ? error.code : 'unexpected';
    console.error(JSON.stringify({ status: 'error', code, message }, null, 2));
    return;
  }
  console.error(message);
}

/** Devuelve el código de salida del proceso. */
export async function executeRun(
  options: RunOptions,
  globals: GlobalOptions,
  context: CommandContext,
): Promise<number> {
  let config: PipelineConfig;
  try {
    config = await resolveRunConfig(options, context);
  } catch (error) {
    printFailure(globals, error);
    return isPipelineError(error) ? error.exitCode : 1;
  }

  const quiet = globals.json || readRuntimeEnv(resolveEnv(context)).quiet;
  const log = context.createLog({
    filePath: config.activityLogFile ? resolveArtifactPath(config.outDir, config.activityLogFile) : null,
    echo: !quiet,
    timezone: config.timezone,
  });

  try {
    const result = await runPipeline(config, { log, fetchImpl: context.fetchImpl });
    printResult(globals, result);
    return 0;
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    if (!isPipelineError(error)) {
      throw error;
    }
    if (quiet) {
      printFailure(globals, error);
    }
    return error.exitCode;
  } finally {
    await log.close();
  }
}

export function registerRunCommand(program: Command, context: CommandContext): Command {
  return program
    .command('run', { isDefault: true })
    .description('Descarga la serie del índice y escribe la tabla de la sesión.')
    .option('--variant <nombre>', 'Preset de despliegue: intraday, intraday-ms o history.')
    .option('--config <archivo>', 'Archivo YAML con la configuración del pipeline.')
    .option('--out-dir <dir>', 'Directorio de salida de los artefactos.')
    .option('--extraction <política>', 'structured, pattern o auto.')
    .option('--cutoff <HHMM>', 'Hora de cierre de la sesión (HHMM) o "none".')
    .addOption(
      new Option('--exclusive-cutoff', 'Descarta las observaciones a la hora exacta del cierre.').conflicts(
        'inclusiveCutoff',
      ),
    )
    .addOption(new Option('--inclusive-cutoff', 'Conserva las observaciones a la hora exacta del cierre.'))
    .option('--timezone <zona>', 'Zona horaria IANA para la hora local.')
    .action(async (options: RunOptions, command: Command) => {
      const globals = context.resolveGlobals(command);
      process.exitCode = await executeRun(options, globals, context);
    });
}
