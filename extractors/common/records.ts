export type RawValue = string | number | boolean | null;

export type RawRecord = Record<string, RawValue>;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Flattens a vendor JSON object into dotted column names, the way tabular tooling
 * normalizes nested payloads: `{ profile: { name: { fullName } } }` becomes
 * `profile.name.fullName`. Arrays are kept as JSON text.
 */
export function flattenRecord(value: unknown, prefix = ''): RawRecord {
  const result: RawRecord = {};
  if (!isPlainObject(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    const column = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(entry)) {
      Object.assign(result, flattenRecord(entry, column));
    } else if (Array.isArray(entry)) {
      result[column] = JSON.stringify(entry);
    } else if (entry === undefined) {
      result[column] = null;
    } else if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean' || entry === null) {
      result[column] = entry;
    } else {
      result[column] = String(entry);
    }
  }
  return result;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/** File-name stamp used by the CSV writer: `YYYY-MM-DD-HH-MM-SS`. */
export function formatFileStamp(date: Date): string {
  return formatTimestamp(date).replace(' ', '-').replace(/:/g, '-');
}

export function epochSecondsToTimestamp(value: RawValue): string | null {
  if (value === null || value === '' || typeof value === 'boolean') {
    return null;
  }
  const seconds = typeof value === 'number' ? value : Number.parseFloat(value);
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return formatTimestamp(new Date(seconds * 1000));
}
