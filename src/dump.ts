#!/usr/bin/env node
/**
 * Export Entry Point
 * Writes the latest star count of every crawled repository to a CSV file.
 *
 * Usage: starcrawl-dump [output.csv]
 */

import fs from 'fs';
import { Writable } from 'stream';
import { env } from './config/env';
import { connectDB, disconnectDB } from './lib/mongo';
import { exportLatestStarCounts } from './modules/repos/repos.export';
import { repoStorage } from './modules/repos/repos.repository';

export const dump = async (
  outputFile: string,
  openOutput: (file: string) => Writable = (file) => fs.createWriteStream(file, { encoding: 'utf-8' })
): Promise<number> => {
  await connectDB();

  try {
    console.log('Querying latest star counts ...');
    const rows = await exportLatestStarCounts(
      repoStorage.streamLatestStarCounts(),
      openOutput(outputFile)
    );
    console.log(`Dump complete: ${outputFile} (${rows} rows)`);
    return rows;
  } finally {
    await disconnectDB();
  }
};

if (require.main === module) {
  dump(process.argv[2] || env.EXPORT_FILE).catch((error: unknown) => {
    console.error('Dump failed:', error);
    process.exit(1);
  });
}
