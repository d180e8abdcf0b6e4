import { z } from 'zod';

import type { RawRecord, RawValue } from './records.js';

export class MissingColumnError extends Error {
  constructor(
    public readonly entity: string,
    public readonly columns: string[],
  ) {
    super(`${entity}: missing required column(s) ${columns.join(', ')}`);
    this.name = 'MissingColumnError';
  }
}

export class MappingError extends Error {
  constructor(
    message: string,
    public readonly entity: string,
    public readonly details: string[],
  ) {
    super(message);
    this.name = 'MappingError';
  }
}

const rawScalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Required identifier; numbers are kept as their decimal text. */
export const idColumn = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

/** Required column whose value may be null. */
export const textColumn = rawScalar.transform((value) => toText(value));

/** Column that vendors omit when empty. */
export const optionalTextColumn = rawScalar.optional().transform((value) => (value === undefined ? null : toText(value)));

export const numberColumn = rawScalar.optional().transform((value) => toOptionalNumber(value ?? null));

export const flagColumn = rawScalar.optional().transform((value) => toFlag(value ?? null));

/** Sync-store timestamps carried by every reconciled record. */
export const syncedTimestamps = {
  CreateDate: z.string(),
  LastModifiedDate: z.string(),
};

/**
 * Validates a batch at the mapping boundary. The batch is read as a table: its columns are
 * the keys seen on any record, and a record lacking one of them holds null there. A
 * required column absent from the whole batch fails with MissingColumnError; an empty
 * batch maps to nothing.
 */
export function parseBatch<S extends z.AnyZodObject>(
  entity: string,
  schema: S,
  records: readonly RawRecord[],
): z.output<S>[] {
  if (records.length === 0) {
    return [];
  }

  const present = new Set(records.flatMap((record) => Object.keys(record)));
  const missing = requiredColumns(schema).filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new MissingColumnError(entity, missing.sort());
  }

  const problems: string[] = [];
  const parsed: z.output<S>[] = [];
  records.forEach((record, index) => {
    const result = schema.safeParse(fillColumns(record, present));
    if (result.success) {
      parsed.push(result.data);
      return;
    }
    for (const issue of result.error.issues) {
      problems.push(`row ${index}: ${issue.path.join('.') || 'root'}: ${issue.message}`);
    }
  });

  if (problems.length > 0) {
    throw new MappingError(`${entity}: ${problems.length} invalid value(s)`, entity, problems.slice(0, 20));
  }
  return parsed;
}

export function requiredColumns(schema: z.AnyZodObject): string[] {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.entries(shape)
    .filter(([, column]) => !column.isOptional())
    .map(([name]) => name);
}

function fillColumns(record: RawRecord, columns: ReadonlySet<string>): RawRecord {
  const filled: RawRecord = {};
  for (const column of columns) {
    filled[column] = record[column] ?? null;
  }
  return filled;
}

export function toText(value: RawValue): string | null {
  if (value === null) return null;
  return String(value);
}

export function toOptionalNumber(value: RawValue): number | null {
  if (value === null || value === '' || typeof value === 'boolean') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toFlag(value: RawValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (value === null) return false;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
