/**
 * Parse JSON text, returning undefined instead of throwing on malformed input.
 * JSON itself has no undefined, so the sentinel is unambiguous.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}
