/**
 * Star Count Export
 * Streams the latest star count per repository to CSV
 */

import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { stringify } from 'csv-stringify';
import { LatestStarCount } from './repos.types';

export const EXPORT_COLUMNS = [
  'node_id',
  'name_with_owner',
  'owner_login',
  'name',
  'star_count',
  'recorded_at',
] as const;

type ExportRow = Record<(typeof EXPORT_COLUMNS)[number], string | number>;

export function toExportRow(row: LatestStarCount): ExportRow {
  return {
    node_id: row.nodeId,
    name_with_owner: row.nameWithOwner,
    owner_login: row.ownerLogin,
    name: row.name,
    star_count: row.starCount,
    recorded_at: row.recordedAt.toISOString(),
  };
}

/**
 * Write rows as CSV with a header line. Returns the number of rows written.
 */
export async function exportLatestStarCounts(
  rows: AsyncIterable<LatestStarCount>,
  output: Writable
): Promise<number> {
  let count = 0;

  async function* toRecords(): AsyncGenerator<ExportRow> {
    for await (const row of rows) {
      count++;
      yield toExportRow(row);
    }
  }

  await pipeline(
    Readable.from(toRecords()),
    stringify({ header: true, columns: [...EXPORT_COLUMNS] }),
    output
  );

  return count;
}
