import fs from 'node:fs';
import path from 'node:path';

import { formatCsv } from '../../shared/csv.js';
import { UDM_COLUMNS, resourceDirectory, type ResourcePartition, type UdmResource, type UdmRowMap } from '../../udm/schema.js';
import { formatFileStamp, systemClock, type Clock } from './records.js';

export interface WriteCsvOptions extends ResourcePartition {
  now?: Clock;
}

/**
 * Writes one pull of a UDM resource to `<output>/<resource dir>/<YYYY-MM-DD-HH-MM-SS>.csv`.
 * An empty batch still produces a header-only file. The loader records such a file as
 * processed and leaves the production rows as they are.
 */
export function writeUdmCsv<R extends UdmResource>(
  outputDirectory: string,
  resource: R,
  rows: ReadonlyArray<UdmRowMap[R]>,
  options: WriteCsvOptions = {},
): string {
  const directory = path.join(outputDirectory, resourceDirectory(resource, options));
  const file = path.join(directory, `${formatFileStamp((options.now ?? systemClock)())}.csv`);
  const columns: readonly string[] = UDM_COLUMNS[resource];
  const records = rows.map((row) => {
    const record: Record<string, string | number | null> = {};
    for (const [key, value] of Object.entries(row)) {
      if (typeof value === 'string' || typeof value === 'number' || value === null) {
        record[key] = value;
      }
    }
    return record;
  });
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(file, formatCsv(columns, records));
  return file;
}
