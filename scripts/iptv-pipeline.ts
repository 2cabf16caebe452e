#!/usr/bin/env npx tsx
/**
 * IPTV Pipeline CLI
 * Usage: npx tsx scripts/iptv-pipeline.ts <command> [args]
 */

import dotenv from 'dotenv';
import path from 'path';
import { loadPipelineConfig } from '@/lib/config';
import { createHttpClient } from '@/lib/http';
import { createLogger } from '@/lib/logger';
import { createRecordStore } from '@/lib/storage';
import { runCommand } from '@/lib/pipeline';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const logger = createLogger('CLI');

async function main(): Promise<number> {
  const config = loadPipelineConfig();
  const store = createRecordStore(config.store, logger.child({ service: 'Store' }));

  try {
    return await runCommand(
      process.argv.slice(2),
      config,
      { store, http: createHttpClient(config.fetch), logger: createLogger('Pipeline') },
      (line) => console.log(line)
    );
  } finally {
    await store.close();
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Pipeline failed', error);
    process.exitCode = 1;
  });
