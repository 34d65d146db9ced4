/**
 * Release Sync Worker
 *
 * BullMQ worker that keeps the release catalog current:
 * - sync-stable: mirrors upstream GitHub releases into the stable channel
 * - sync-snapshot: publishes the weekly snapshot build and sweeps expired ones
 *
 * Concurrency is 1 so at most one pass touches the working copy at a time.
 */

import { Job, Queue, Worker } from 'bullmq';
import { getConfig } from '../config/validate';
import { getRedisConnection } from '../services/redis';
import {
  getReleaseSyncOrchestrator,
  type ReleaseSyncOrchestrator,
  type SnapshotSyncResult,
  type StableSyncResult
} from '../services/releaseSync';

const RELEASE_SYNC_QUEUE = 'release-sync';

interface SyncStableJobData {
  type: 'sync-stable';
}

interface SyncSnapshotJobData {
  type: 'sync-snapshot';
}

export type ReleaseSyncJobData = SyncStableJobData | SyncSnapshotJobData;
export type ReleaseSyncJobResult = StableSyncResult | SnapshotSyncResult;

type ReleaseSyncRunner = Pick<ReleaseSyncOrchestrator, 'syncStable' | 'syncSnapshot'>;

let releaseSyncQueue: Queue<ReleaseSyncJobData> | null = null;
let releaseSyncWorker: Worker<ReleaseSyncJobData, ReleaseSyncJobResult> | null = null;

export function getReleaseSyncQueue(): Queue<ReleaseSyncJobData> {
  if (!releaseSyncQueue) {
    releaseSyncQueue = new Queue<ReleaseSyncJobData>(RELEASE_SYNC_QUEUE, {
      connection: getRedisConnection()
    });
  }
  return releaseSyncQueue;
}

export async function processReleaseSyncJob(
  data: ReleaseSyncJobData,
  orchestrator: ReleaseSyncRunner = getReleaseSyncOrchestrator()
): Promise<ReleaseSyncJobResult> {
  switch (data.type) {
    case 'sync-stable':
      return orchestrator.syncStable();
    case 'sync-snapshot':
      return orchestrator.syncSnapshot();
    default: {
      const unknownJob: never = data;
      throw new Error(`Unknown release sync job: ${JSON.stringify(unknownJob)}`);
    }
  }
}

function createReleaseSyncWorker(): Worker<ReleaseSyncJobData, ReleaseSyncJobResult> {
  return new Worker<ReleaseSyncJobData, ReleaseSyncJobResult>(
    RELEASE_SYNC_QUEUE,
    async (job: Job<ReleaseSyncJobData>) => {
      const startTime = Date.now();
      const result = await processReleaseSyncJob(job.data);
      console.log(`[ReleaseSyncWorker] ${job.data.type} finished in ${Date.now() - startTime}ms`);
      return result;
    },
    {
      connection: getRedisConnection(),
      concurrency: 1
    }
  );
}

export async function scheduleReleaseSyncJobs(intervals: Record<ReleaseSyncJobData['type'], number>): Promise<void> {
  const queue = getReleaseSyncQueue();

  const repeatables = await queue.getRepeatableJobs();
  for (const repeatable of repeatables) {
    if (repeatable.name === 'sync-stable' || repeatable.name === 'sync-snapshot') {
      await queue.removeRepeatableByKey(repeatable.key);
    }
  }

  for (const type of ['sync-stable', 'sync-snapshot'] as const) {
    await queue.add(
      type,
      { type },
      {
        repeat: { every: intervals[type] * 60 * 1000 },
        removeOnComplete: { count: 10 },
        removeOnFail: { count: 20 }
      }
    );
  }
}

export async function initializeReleaseSyncJobs(): Promise<void> {
  const config = getConfig();

  releaseSyncWorker = createReleaseSyncWorker();

  releaseSyncWorker.on('error', (error) => {
    console.error('[ReleaseSyncWorker] Worker error:', error);
  });

  releaseSyncWorker.on('failed', (job, error) => {
    console.error(`[ReleaseSyncWorker] Job ${job?.id} (${job?.data.type}) failed:`, error);
  });

  await scheduleReleaseSyncJobs({
    'sync-stable': config.STABLE_SYNC_INTERVAL_MINUTES,
    'sync-snapshot': config.SNAPSHOT_SYNC_INTERVAL_MINUTES
  });

  console.log('[ReleaseSyncWorker] Release sync worker initialized');
}

export async function shutdownReleaseSyncJobs(): Promise<void> {
  if (releaseSyncWorker) {
    await releaseSyncWorker.close();
    releaseSyncWorker = null;
  }

  if (releaseSyncQueue) {
    await releaseSyncQueue.close();
    releaseSyncQueue = null;
  }

  console.log('[ReleaseSyncWorker] Release sync worker shut down');
}
