export function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export function looksLikeJson(text: string): boolean {
  const trimmed = text.trimStart();
  return trimmed.startsWith('{') || trimmed.startsWith('[');
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Localiza el arreglo de entradas en `document` siguiendo una ruta con puntos.
 * Un documento que ya es un arreglo se devuelve tal cual.
 */
export function resolveCollection(document: unknown, collectionPath: string): readonly unknown[] | undefined {
  if (Array.isArray(document)) {
    return document;
  }

  const segments = collectionPath
    .split('.')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  let cursor: unknown = document;
  for (const segment of segments) {
    if (!isRecord(cursor)) {
      return undefined;
    }
    cursor = cursor[segment];
  }

  return Array.isArray(cursor) ? cursor : undefined;
}
