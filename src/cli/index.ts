#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import process from 'node:process';

import { Command } from 'commander';

import { loadDotenvFiles } from '../bootstrap/env.js';
import { createActivityLog } from '../bootstrap/logger.js';
import { attachHelp } from './help.js';
import { registerRunCommand } from './commands/run.js';
import { registerVariantsCommand } from './commands/variants.js';
import type { CommandContext, GlobalOptions } from './commands/shared.js';

export function buildProgram(overrides: Partial<CommandContext> = {}): Command {
  const program = new Command('px1-intraday');
  program.option('--json', 'Imprime los resultados en formato JSON');

  program.showHelpAfterError('(usa --help para más detalles)');
  program.allowExcessArguments(false);
  program.exitOverride();

  const context: CommandContext = {
    resolveGlobals: (command: Command) => {
      const root = command.parent ?? command;
      const opts = root.opts<{ json?: boolean }>();
      const resolved: GlobalOptions = { json: Boolean(opts.json) };
      return resolved;
    },
    env: process.env,
    createLog: createActivityLog,
    ...overrides,
  };

  registerRunCommand(program, context);
  registerVariantsCommand(program, context);

  attachHelp(program);

  return program;
}

const isCommanderExit = (error: unknown): error is Error & { code: string; exitCode: number } =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('commander.') &&
  'exitCode' in error &&
  typeof error.exitCode === 'number';

export async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  loadDotenvFiles();
  const program = buildProgram();

  try {
    await program.parseAsync(['node', 'px1-intraday', ...argv]);
  } catch (error) {
    if (isCommanderExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }
    if (error instanceof Error) {
      console.error(error.message);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

const isDirectExecution = (() => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
})();

if (isDirectExecution) {
  await runCli();
}
