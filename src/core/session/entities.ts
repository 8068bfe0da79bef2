import { JsonObject } from '../types';

/**
 * Undo the HTML escaping the agent CLI applies to some text. `&amp;` goes last so `&amp;lt;`
 * becomes `&lt;`, not `<`.
 */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) return text;
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

function decodeValue(value: unknown): unknown {
  if (typeof value === 'string') return decodeEntities(value);
  if (Array.isArray(value)) return value.map(decodeValue);
  if (typeof value === 'object' && value !== null) return decodeObject(value);
  return value;
}

function decodeObject(value: object): JsonObject {
  const decoded: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    decoded[key] = decodeValue(entry);
  }
  return decoded;
}

/** Decode every string inside a tool's parameters; keys and non-string values are kept. */
export function decodeEntitiesDeep(parameters: JsonObject): JsonObject {
  return decodeObject(parameters);
}
