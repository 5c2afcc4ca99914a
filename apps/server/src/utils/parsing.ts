/**
 * Safe Type Coercion Utilities
 *
 * Consistent parsing of unknown Emby API response data into typed values.
 * Every function accepts null, undefined and wrongly-typed input.
 */

export type UnknownRecord = Record<string, unknown>;

/**
 * Check whether a value is a plain object (not null, not an array)
 */
export function isRecord(val: unknown): val is UnknownRecord {
  return val != null && typeof val === 'object' && !Array.isArray(val);
}

/**
 * Safely convert unknown value to string
 *
 * @example
 * parseString(response.Id) // "abc123"
 * parseString(null) // ""
 * parseString(undefined, 'unknown') // "unknown"
 */
export function parseString(val: unknown, defaultVal = ''): string {
  if (val == null) return defaultVal;
  return String(val);
}

/**
 * Convert unknown value to a non-empty string or undefined.
 * Empty and whitespace-only strings count as absent.
 *
 * @example
 * parseOptionalString(response.SeriesName) // "Breaking Bad" or undefined
 */
export function parseOptionalString(val: unknown): string | undefined {
  if (val == null || typeof val === 'object') return undefined;
  const str = String(val);
  return str.trim() === '' ? undefined : str;
}

/**
 * Safely convert unknown value to number.
 * Numeric strings ("4000000") are accepted; NaN falls back to the default.
 *
 * @example
 * parseNumber(response.Bitrate) // 4000000
 * parseNumber("invalid") // 0
 */
export function parseNumber(val: unknown, defaultVal = 0): number {
  return parseOptionalNumber(val) ?? defaultVal;
}

/**
 * Safely convert unknown value to a finite number or undefined
 *
 * @example
 * parseOptionalNumber(response.ParentIndexNumber) // 2 or undefined
 */
export function parseOptionalNumber(val: unknown): number | undefined {
  if (val == null || typeof val === 'boolean' || typeof val === 'object') return undefined;
  if (typeof val === 'string' && val.trim() === '') return undefined;
  const num = Number(val);
  return Number.isFinite(num) ? num : undefined;
}

/**
 * Safely convert unknown value to boolean
 *
 * @example
 * parseBoolean(response.IsPaused) // true
 * parseBoolean("false") // false
 */
export function parseBoolean(val: unknown, defaultVal = false): boolean {
  return parseOptionalBoolean(val) ?? defaultVal;
}

export function parseOptionalBoolean(val: unknown): boolean | undefined {
  if (val == null) return undefined;
  if (typeof val === 'string') {
    const lower = val.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  return Boolean(val);
}

/**
 * Safely get a nested object from an unknown object
 *
 * @example
 * const policy = getNestedObject(user, 'Policy');
 * const isAdmin = parseBoolean(policy?.IsAdministrator);
 */
export function getNestedObject(val: unknown, key: string): UnknownRecord | undefined {
  if (!isRecord(val)) return undefined;
  const nested = val[key];
  return isRecord(nested) ? nested : undefined;
}

/**
 * Safely get a nested array of objects; non-object entries are dropped
 *
 * @example
 * const streams = getNestedRecords(nowPlaying, 'MediaStreams');
 */
export function getNestedRecords(val: unknown, key: string): UnknownRecord[] {
  if (!isRecord(val)) return [];
  return parseRecordArray(val[key]);
}

/**
 * Keep the object entries of an unknown array
 */
export function parseRecordArray(val: unknown): UnknownRecord[] {
  if (!Array.isArray(val)) return [];
  return val.filter(isRecord);
}

/**
 * Extract the item list from a response that may be either a bare array
 * or a `{ Items: [...] }` query result
 *
 * @example
 * parseItems(await client.get('/LiveTv/Timers')) // UnknownRecord[]
 */
export function parseItems(val: unknown): UnknownRecord[] {
  if (Array.isArray(val)) return parseRecordArray(val);
  if (isRecord(val)) return parseRecordArray(val.Items);
  return [];
}

/**
 * Parse a string list from either a list or a comma separated string
 *
 * @example
 * parseStringList(['ContainerNotSupported']) // ['ContainerNotSupported']
 * parseStringList('VideoCodecNotSupported,AudioCodecNotSupported') // two entries
 */
export function parseStringList(val: unknown): string[] | undefined {
  if (Array.isArray(val)) {
    const items = val.map(parseOptionalString).filter((s): s is string => s !== undefined);
    return items.length > 0 ? items : undefined;
  }
  const str = parseOptionalString(val);
  if (!str) return undefined;
  const items = str
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Parse ISO date string to Date or null
 *
 * @example
 * parseDate('2024-01-15T10:30:00Z') // Date
 * parseDate('not a date') // null
 */
export function parseDate(val: unknown): Date | null {
  const str = parseOptionalString(val);
  if (!str) return null;
  const date = new Date(str);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Drop keys whose value is undefined, null, '' or an empty array/object.
 * Meant for shapes whose fields are all optional.
 *
 * @example
 * compact({ id: 'a', title: '', genres: [] }) // { id: 'a' }
 */
export function compact<T extends object>(obj: T): T {
  const out = { ...obj };
  for (const [key, value] of Object.entries(out)) {
    const empty =
      value == null ||
      value === '' ||
      (Array.isArray(value) && value.length === 0) ||
      (isRecord(value) && Object.keys(value).length === 0);
    if (empty) Reflect.deleteProperty(out, key);
  }
  return out;
}
