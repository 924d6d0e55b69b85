const SLUG_STRIP = /[^\w\s./-]/g;
const SLUG_HYPHENATE = /[-./\s]+/g;
const NON_ASCII = /[^\x00-\x7f]/g;
const ISO_FULL_DATE = /^\d{4}-\d{2}-\d{2}.\d{2}:\d{2}.*$/;
const ISO_PART_DATE = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

/**
 * Normalizes a title into a slug: ASCII only, lower case, runs of separators
 * collapsed into single hyphens.
 *
 * @example slugify('Crème Brûlée: A Recipe') // 'creme-brulee-a-recipe'
 */
export function slugify(value: string): string {
  const ascii = value.normalize('NFKD').replace(NON_ASCII, '');
  return ascii.replace(SLUG_STRIP, '').trim().toLowerCase().replace(SLUG_HYPHENATE, '-');
}

/** `YYYY-MM-DDTHH:MM:SSZ` in UTC, the timestamp format the service accepts. */
export function formatDate(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parses the service's timestamp strings. Times without a zone are read as UTC.
 */
export function parseDate(value: string): Date | undefined {
  let text = value;
  if (ISO_PART_DATE.test(value)) {
    text = `${value}T00:00:00Z`;
  } else if (ISO_FULL_DATE.test(value)) {
    text = `${value.slice(0, 10)}T${value.slice(11)}`;
    if (!HAS_ZONE.test(text)) {
      text = `${text}Z`;
    }
  } else {
    return undefined;
  }
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Recursively cleans a decoded response: `"null"` and `"Null"` become `null`,
 * timestamp strings become `Date`s. Returns a new structure.
 */
export function parseResponse(value: unknown): unknown {
  if (typeof value === 'string') {
    if (value === 'null' || value === 'Null') {
      return null;
    }
    return parseDate(value) ?? value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => parseResponse(item));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = parseResponse(item);
    }
    return out;
  }
  return value;
}

/**
 * Prepares a request payload: every `Date` is rendered with {@link formatDate}.
 */
export function parseRequest(value: unknown): unknown {
  if (value instanceof Date) {
    return formatDate(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => parseRequest(item));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = parseRequest(item);
    }
    return out;
  }
  return value;
}
