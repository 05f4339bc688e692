import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

const DOTENV_FILES = ['.env', '.env.local'];

export function loadDotenvFiles(rootDir: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const filename of DOTENV_FILES) {
    const filepath = path.join(rootDir, filename);
    if (fs.existsSync(filepath)) {
      loadEnv({ path: filepath, override: true });
      loaded.push(filepath);
    }
  }
  return loaded;
}

const RawEnvSchema = z
  .object({
    PX1_CONFIG: z.string().optional(),
    PX1_QUIET: z.string().optional(),
  })
  .passthrough();

const coerceBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
};

export type RuntimeEnv = {
  readonly configPath?: string;
  readonly quiet: boolean;
};

export function readRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const rawEnv = RawEnvSchema.parse(env);
  const configPath = rawEnv.PX1_CONFIG?.trim();
  return {
    ...(configPath ? { configPath: path.resolve(configPath) } : {}),
    quiet: coerceBoolean(rawEnv.PX1_QUIET, false),
  };
}
