import process from 'node:process';

import type { Command } from 'commander';

import type { ActivityLog, ActivityLogOptions } from '../../bootstrap/logger.js';
import type { FetchLike } from '../../pipeline/transport.js';

export type GlobalOptions = { json: boolean };

export type CommandContext = {
  readonly resolveGlobals: (command: Command) => GlobalOptions;
  readonly env?: NodeJS.ProcessEnv;
  readonly fetchImpl?: FetchLike;
  readonly createLog: (options: ActivityLogOptions) => ActivityLog;
};

export function resolveEnv(context: CommandContext): NodeJS.ProcessEnv {
  return context.env ?? process.env;
}
