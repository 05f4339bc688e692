import type { Command } from 'commander';

const INTRO = `Extractor periódico del índice CAC 40 (PX1, XPAR).

La configuración se puede definir vía CLI, archivo YAML y variables de entorno PX1_*.
La precedencia es: CLI > variables de entorno > archivo de configuración > preset de la variante.`;

const EXAMPLES = `
Ejemplos:
  px1-intraday
  px1-intraday run --variant history --out-dir /var/lib/px1
  px1-intraday run --config px1.yaml --cutoff 1730 --exclusive-cutoff
  px1-intraday variants --json
`;

export function attachHelp(program: Command): void {
  program.addHelpText('beforeAll', `${INTRO}\n`);
  program.addHelpText('afterAll', EXAMPLES);
  program.configureHelp({
    commandUsage: () => 'px1-intraday [comando] [opciones]',
  });
}
