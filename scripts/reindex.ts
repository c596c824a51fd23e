// scripts/reindex.ts
// What: Offline index rebuild. `npm run reindex -- --force` clears the collection first.
// How: Builds the same services as the server, runs one rebuild and prints the summary as JSON.

import { getConfig } from '../src/config/env.js';
import { moduleLogger } from '../src/logging.js';
import { createServices } from '../src/services/container.js';

const log = moduleLogger('reindex');

async function main(): Promise<void> {
  const force = process.argv.slice(2).includes('--force');
  const services = await createServices(getConfig());
  try {
    await services.embeddings.init();
    const summary = await services.indexer.rebuildIndex(force);
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    if (summary.failed.length > 0) process.exitCode = 1;
  } finally {
    await services.close();
  }
}

main().catch((err: unknown) => {
  log.error({ err }, 'Reindex failed');
  process.exitCode = 1;
});
