// RFC 6901 JSON Pointer helpers for locating template nodes in error reports.

export type JsonPointer = string;

export const ROOT_POINTER: JsonPointer = '';

export function encodePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function appendPointer(
  base: JsonPointer,
  token: string | number
): JsonPointer {
  return `${base}/${encodePointerToken(String(token))}`;
}
