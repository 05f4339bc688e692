import { mkdirSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';

function normaliseDirectory(directory: string | null | undefined): string | null {
  if (directory === null || directory === undefined) {
    return null;
  }
  const trimmed = directory.trim();
  if (!trimmed || trimmed === '.') {
    return null;
  }
  return trimmed;
}

export function ensureDirectorySync(directory: string | null | undefined): string | null {
  const normalised = normaliseDirectory(directory);
  if (!normalised) {
    return null;
  }
  mkdirSync(normalised, { recursive: true });
  return normalised;
}

export async function ensureDirectoryForFile(filePath: string): Promise<string | null> {
  const normalised = normaliseDirectory(dirname(filePath));
  if (!normalised) {
    return null;
  }
  await mkdir(normalised, { recursive: true });
  return normalised;
}

/** Resuelve `file` contra `outDir` salvo que ya sea absoluto. */
export function resolveArtifactPath(outDir: string, file: string): string {
  return isAbsolute(file) ? file : resolve(outDir, file);
}
