import { randomUUID } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ensureDirectoryForFile } from './dir.js';

export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await ensureDirectoryForFile(filePath);
  const tempPath = path.join(path.dirname(filePath), `${path.basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await writeFile(tempPath, data, { encoding: 'utf8' });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/** Copia de auditoría: el cuerpo tal cual, sobrescribiendo la de la ejecución anterior. */
export async function writeRawArtifact(filePath: string, bytes: Uint8Array): Promise<void> {
  await ensureDirectoryForFile(filePath);
  await writeFile(filePath, bytes);
}
