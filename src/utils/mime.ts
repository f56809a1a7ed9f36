import table from "./mime.json";

const MIME_TYPES = new Map<string, string>(Object.entries(table));

/**
 * Looks up the MIME type registered for a file extension (without the dot).
 */
export function lookup(extension: string): string | undefined {
  return MIME_TYPES.get(extension.toLowerCase());
}
