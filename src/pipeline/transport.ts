import type { PipelineConfig } from '../config.js';
import { TransportError } from './errors.js';
import type { TransportResponse } from './types.js';

export type FetchLike = typeof fetch;

function decodeBody(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { ignoreBOM: true }).decode(bytes);
}

type TransportOptions = Pick<PipelineConfig, 'endpointUrl' | 'userAgent'>;

// El estado HTTP no se evalúa aquí: el rechazo del proveedor se detecta por el cuerpo.
export async function fetchRawPayload(
  options: TransportOptions,
  fetchImpl: FetchLike = fetch,
): Promise<TransportResponse> {
  const url = options.endpointUrl;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: { 'User-Agent': options.userAgent },
    });
  } catch (error) {
    throw new TransportError(url, error);
  }

  let bytes: Buffer;
  try {
    bytes = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new TransportError(url, error);
  }

  return { url, status: response.status, bytes, body: decodeBody(bytes) };
}
