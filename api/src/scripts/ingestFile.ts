/**
 * Ingest a text file from the command line.
 *
 * Usage:
 *   cd api
 *   npx tsx src/scripts/ingestFile.ts <path> [name]
 *
 * The document name defaults to the file's base name. Uses the same
 * configuration as the server (DATABASE_URL, OPENAI_API_KEY, ...).
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { getConfig } from '@/config';
import { closeDatabase, ensureSchema } from '@/db/client';
import { createServices } from '@/services/container';
import { describeError, logger } from '@/utils/logger';

async function main(): Promise<void> {
  const [filePath, nameArg] = process.argv.slice(2);
  if (!filePath) {
    throw new Error('Usage: ingestFile.ts <path> [name]');
  }

  const config = getConfig();
  if (config.storage.driver === 'memory') {
    logger.warn('STORAGE_DRIVER=memory: the document is discarded when this script exits');
  }

  const services = createServices(config);
  if (config.storage.driver === 'postgres') {
    await ensureSchema();
  }

  const text = await readFile(filePath, 'utf8');
  const result = await services.ingestion.ingest(nameArg ?? basename(filePath), text);
  logger.info('Ingest finished', { file: filePath, ...result });
}

try {
  await main();
} catch (error) {
  logger.error('Ingest failed', describeError(error));
  process.exitCode = 1;
} finally {
  await closeDatabase();
}
