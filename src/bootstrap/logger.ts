import fs from 'node:fs';
import path from 'node:path';

import { DateTime } from 'luxon';

import { ensureDirectorySync } from '../io/dir.js';

export type ActivityLog = {
  readonly logPath: string | null;
  readonly info: (message: string, ...metadata: unknown[]) => void;
  readonly warn: (message: string, ...metadata: unknown[]) => void;
  readonly error: (message: string, ...metadata: unknown[]) => void;
  readonly close: () => Promise<void>;
};

export type ActivityLogOptions = {
  /** Archivo de registro en modo append. `null`: solo consola. */
  readonly filePath?: string | null;
  /** Repite cada línea en consola. */
  readonly echo?: boolean;
  readonly timezone?: string;
  readonly clock?: () => DateTime;
};

type Level = 'info' | 'warn' | 'error';

function formatMetadata(metadata: readonly unknown[]): string {
  if (!metadata.length) {
    return '';
  }

  const parts = metadata.map((entry) => {
    if (typeof entry === 'string') {
      return entry;
    }
    if (entry instanceof Error) {
      return entry.message;
    }

    try {
      return JSON.stringify(entry);
    } catch (_error) {
      return String(entry);
    }
  });

  return ` ${parts.join(' ')}`;
}

export function formatLogLine(timestamp: DateTime, message: string, metadata: readonly unknown[] = []): string {
  return `[${timestamp.toFormat('yyyy-MM-dd HH:mm:ss')}] ${message}${formatMetadata(metadata)}`;
}

const CONSOLE_SINKS: Record<Level, (line: string) => void> = {
  /* eslint-disable no-console */
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  /* eslint-enable no-console */
};

export function createActivityLog(options: ActivityLogOptions = {}): ActivityLog {
  const { filePath = null, echo = true, timezone } = options;
  const clock = options.clock ?? (() => (timezone ? DateTime.now().setZone(timezone) : DateTime.now()));

  let stream: fs.WriteStream | null = null;
  if (filePath) {
    ensureDirectorySync(path.dirname(filePath));
    stream = fs.createWriteStream(filePath, { flags: 'a' });
    // Un registro que no se puede escribir no detiene la ejecución; queda solo la consola.
    stream.on('error', (error: Error) => {
      CONSOLE_SINKS.error(`No se pudo escribir el registro ${filePath}: ${error.message}`);
    });
  }

  let closed = false;

  const write = (level: Level, message: string, metadata: readonly unknown[]) => {
    if (closed) {
      return;
    }

    const line = formatLogLine(clock(), message, metadata);
    if (stream && !stream.destroyed) {
      stream.write(`${line}\n`);
    }
    if (echo) {
      CONSOLE_SINKS[level](line);
    }
  };

  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;

    const current = stream;
    if (!current || current.closed) {
      return;
    }

    // Los fallos de escritura ya se notifican desde el listener de 'error'.
    await new Promise<void>((resolve) => {
      current.once('close', () => resolve());
      if (!current.destroyed) {
        current.end();
      }
    });
  };

  return {
    logPath: filePath,
    info: (message: string, ...metadata: unknown[]) => write('info', message, metadata),
    warn: (message: string, ...metadata: unknown[]) => write('warn', message, metadata),
    error: (message: string, ...metadata: unknown[]) => write('error', message, metadata),
    close,
  };
}
