/**
 * Runs release synchronization once, outside the job queue.
 *
 * Usage:
 *   npm run sync -- stable
 *   npm run sync -- snapshot
 *   npm run sync            (both, stable first)
 *
 * Do not run while the API's release sync worker is active: both share the working copy.
 */

import { validateConfig } from '../config/validate';
import { closeDb } from '../db';
import { getReleaseSyncOrchestrator } from '../services/releaseSync';
import { parseSyncTarget, runSyncTarget } from './syncTargets';

function log(message: string): void {
  console.log(`[sync] ${message}`);
}

async function main(): Promise<void> {
  const target = parseSyncTarget(process.argv.slice(2));
  validateConfig();
  await runSyncTarget(target, getReleaseSyncOrchestrator(), log);
}

main()
  .then(() => closeDb())
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Release sync failed:', err);
    process.exit(1);
  });
