/**
 * Parsed `Content-Type` / `Accept` media type. Type and subtype are
 * lower-cased; parameter names are lower-cased, values kept as sent.
 */
export interface MediaType {
  type: string;
  subtype: string;
  parameters: Record<string, string>;
}

export const MediaTypes = {
  JSON: 'application/json',
  FORM: 'application/x-www-form-urlencoded',
  TEXT: 'text/plain',
} as const;

/**
 * Parses a media type such as `application/json; charset=utf-8`.
 * Returns `undefined` when the value has no `type/subtype` pair.
 */
export function parseMediaType(value: string): MediaType | undefined {
  const [essence = '', ...params] = value.split(';');
  const [type, subtype, ...extra] = essence.trim().toLowerCase().split('/');
  if (!type || !subtype || extra.length > 0) {
    return undefined;
  }

  const parameters: Record<string, string> = {};
  for (const param of params) {
    const index = param.indexOf('=');
    if (index <= 0) continue;
    const name = param.slice(0, index).trim().toLowerCase();
    const raw = param.slice(index + 1).trim();
    parameters[name] = raw.startsWith('"') && raw.endsWith('"') ? raw.slice(1, -1) : raw;
  }

  return { type, subtype, parameters };
}

export function formatMediaType(mediaType: MediaType): string {
  return `${mediaType.type}/${mediaType.subtype}`;
}

/**
 * Whether `mediaType` falls within `range`: the full wildcard, a type wildcard such as `text/*` or an exact match.
 * Parameters are ignored.
 */
export function mediaTypeMatches(range: string, mediaType: MediaType): boolean {
  const parsed = parseMediaType(range);
  if (!parsed) return false;
  if (parsed.type === '*') return parsed.subtype === '*';
  if (parsed.type !== mediaType.type) return false;
  return parsed.subtype === '*' || parsed.subtype === mediaType.subtype;
}

/**
 * JSON or a `+json` structured syntax suffix (RFC 6839).
 */
export function isJsonMediaType(mediaType: MediaType): boolean {
  return (
    (mediaType.type === 'application' && mediaType.subtype === 'json') ||
    mediaType.subtype.endsWith('+json')
  );
}
