import fs from 'node:fs';
import path from 'node:path';

import { parseCsv } from '../../shared/csv.js';
import { RESOURCE_SCOPE, type ResourcePartition, type UdmResource } from '../../udm/schema.js';

export interface ResourceFile {
  resource: UdmResource;
  path: string;
  partition: ResourcePartition;
}

export type CsvRow = Record<string, string>;

function partitionDirectories(parent: string, key: 'section' | 'assignment'): { id: string; directory: string }[] {
  if (!fs.existsSync(parent)) {
    return [];
  }
  const prefix = `${key}=`;
  return fs
    .readdirSync(parent, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && entry.name.startsWith(prefix))
    .map((entry) => ({ id: entry.name.slice(prefix.length), directory: path.join(parent, entry.name) }))
    .sort((left, right) => left.id.localeCompare(right.id));
}

/** Most recent `.csv` in `directory`; file names are timestamps, so the last by name wins. */
export function latestCsvFile(directory: string): string | undefined {
  if (!fs.existsSync(directory)) {
    return undefined;
  }
  const files = fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.csv'))
    .map((entry) => entry.name)
    .sort();
  const latest = files.at(-1);
  return latest ? path.join(directory, latest) : undefined;
}

/** The newest file of `resource` in every partition under `csvPath`. */
export function listResourceFiles(csvPath: string, resource: UdmResource): ResourceFile[] {
  const located: { directory: string; partition: ResourcePartition }[] = [];
  const scope = RESOURCE_SCOPE[resource];

  if (scope === 'root') {
    located.push({ directory: path.join(csvPath, resource), partition: {} });
  } else {
    for (const section of partitionDirectories(csvPath, 'section')) {
      if (scope === 'section') {
        located.push({ directory: path.join(section.directory, resource), partition: { sectionId: section.id } });
        continue;
      }
      for (const assignment of partitionDirectories(section.directory, 'assignment')) {
        located.push({
          directory: path.join(assignment.directory, resource),
          partition: { sectionId: section.id, assignmentId: assignment.id },
        });
      }
    }
  }

  const files: ResourceFile[] = [];
  for (const { directory, partition } of located) {
    const file = latestCsvFile(directory);
    if (file) {
      files.push({ resource, path: file, partition });
    }
  }
  return files;
}

/**
 * Reads a UDM CSV into rows keyed by `columns`. Header names outside `columns` are ignored
 * and columns absent from the header read as ''.
 */
export function readUdmCsv(file: string, columns: readonly string[]): CsvRow[] {
  const [header, ...records] = parseCsv(fs.readFileSync(file, 'utf8'));
  if (!header) {
    return [];
  }
  const positions = new Map(header.map((name, index) => [name.trim(), index]));
  return records.map((record) => {
    const row: CsvRow = {};
    for (const column of columns) {
      const index = positions.get(column);
      row[column] = index === undefined ? '' : (record[index] ?? '');
    }
    return row;
  });
}
