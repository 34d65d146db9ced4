import type { ReleaseSyncOrchestrator } from '../services/releaseSync';

export const SYNC_TARGETS = ['stable', 'snapshot', 'all'] as const;
export type SyncTarget = (typeof SYNC_TARGETS)[number];

export function parseSyncTarget(args: string[]): SyncTarget {
  const [value = 'all', ...rest] = args.filter((arg) => !arg.startsWith('--'));
  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(' ')}`);
  }

  const target = SYNC_TARGETS.find((candidate) => candidate === value);
  if (!target) {
    throw new Error(`Unknown sync target "${value}". Expected one of: ${SYNC_TARGETS.join(', ')}`);
  }
  return target;
}

/** Runs the selected passes in order; the first failure stops the run. */
export async function runSyncTarget(
  target: SyncTarget,
  orchestrator: Pick<ReleaseSyncOrchestrator, 'syncStable' | 'syncSnapshot'>,
  log: (line: string) => void = console.log
): Promise<void> {
  if (target === 'stable' || target === 'all') {
    const result = await orchestrator.syncStable();
    log(`Stable releases synced: ${result.synced}`);
  }

  if (target === 'snapshot' || target === 'all') {
    const result = await orchestrator.syncSnapshot();
    log(`Snapshot ${result.versionName}: ${result.created ? 'published' : 'already published'}`);
    if (result.expired.length > 0) {
      log(`Expired snapshots removed: ${result.expired.join(', ')}`);
    }
  }
}
