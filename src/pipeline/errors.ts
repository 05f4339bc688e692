export type PipelineErrorCode = 'transport' | 'access-denied' | 'malformed-payload' | 'config';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly exitCode: number;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.exitCode = 1;
  }
}

export class TransportError extends PipelineError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('transport', `Error de conexión con la API (${url}): ${detail}`, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

export class AccessDeniedError extends PipelineError {
  readonly status: number;

  constructor(status: number) {
    super(
      'access-denied',
      'Error 403: acceso prohibido a la API. Revisa los permisos o las cabeceras de la petición.',
    );
    this.name = 'AccessDeniedError';
    this.status = status;
  }
}

export class MalformedPayloadError extends PipelineError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('malformed-payload', `Payload inválido: ${reason}`, options);
    this.name = 'MalformedPayloadError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export const isPipelineError = (error: unknown): error is PipelineError => error instanceof PipelineError;
