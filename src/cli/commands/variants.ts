import type { Command } from 'commander';

import { DEFAULT_VARIANT, VARIANTS, VARIANT_NAMES, type PipelineConfig } from '../../config.js';
import type { CommandContext } from './shared.js';

const describeCutoff = (config: PipelineConfig): string => {
  if (config.sessionCutoffHHMM === null) {
    return 'sin filtro';
  }
  return `${config.cutoffInclusive ? '<=' : '<'} ${config.sessionCutoffHHMM}`;
};

export function describeVariant(config: PipelineConfig): string {
  const parts = [
    `extraction=${config.extraction}`,
    `unit=${config.timestampUnit}`,
    `cutoff=${describeCutoff(config)}`,
    `date=${config.dateFormat}`,
    `table=${config.tableFile}`,
    `log=${config.activityLogFile ?? 'consola'}`,
  ];
  const marker = config.variant === DEFAULT_VARIANT ? ' (por defecto)' : '';
  return `- ${config.variant}${marker}: ${parts.join(' ')}`;
}

export function registerVariantsCommand(program: Command, context: CommandContext): Command {
  return program
    .command('variants')
    .description('Lista los presets de despliegue disponibles.')
    .action((_options: Record<string, never>, command: Command) => {
      const globals = context.resolveGlobals(command);
      if (globals.json) {
        console.log(JSON.stringify(VARIANTS, null, 2));
        return;
      }

      console.log(`Variantes (${VARIANT_NAMES.length}):`);
      for (const name of VARIANT_NAMES) {
        console.log(describeVariant(VARIANTS[name]));
      }
    });
}
