import { describe, expect, it, vi } from 'vitest';
import { parseSyncTarget, runSyncTarget } from './syncTargets';

function createOrchestrator() {
  return {
    syncStable: vi.fn().mockResolvedValue({ synced: 2, versions: ['v1.2.0', 'v1.1.0'] }),
    syncSnapshot: vi.fn().mockResolvedValue({ versionName: 'abc123', created: true, expired: ['old1', 'old2'] })
  };
}

describe('parseSyncTarget', () => {
  it('defaults to all', () => {
    expect(parseSyncTarget([])).toBe('all');
  });

  it('accepts a known target and ignores flags', () => {
    expect(parseSyncTarget(['--verbose', 'snapshot'])).toBe('snapshot');
  });

  it('rejects unknown targets', () => {
    expect(() => parseSyncTarget(['nightly'])).toThrow(
      'Unknown sync target "nightly". Expected one of: stable, snapshot, all'
    );
  });

  it('rejects extra arguments', () => {
    expect(() => parseSyncTarget(['stable', 'snapshot'])).toThrow('Unexpected arguments: snapshot');
  });
});

describe('runSyncTarget', () => {
  it('runs only the stable pass', async () => {
    const orchestrator = createOrchestrator();
    const lines: string[] = [];

    await runSyncTarget('stable', orchestrator, (line) => lines.push(line));

    expect(orchestrator.syncSnapshot).not.toHaveBeenCalled();
    expect(lines).toEqual(['Stable releases synced: 2']);
  });

  it('runs both passes for all', async () => {
    const orchestrator = createOrchestrator();
    const lines: string[] = [];

    await runSyncTarget('all', orchestrator, (line) => lines.push(line));

    expect(lines).toEqual([
      'Stable releases synced: 2',
      'Snapshot abc123: published',
      'Expired snapshots removed: old1, old2'
    ]);
  });

  it('stops at the first failure', async () => {
    const orchestrator = createOrchestrator();
    orchestrator.syncStable.mockRejectedValue(new Error('HTTP 401 Unauthorized'));

    await expect(runSyncTarget('all', orchestrator, () => undefined)).rejects.toThrow('HTTP 401 Unauthorized');
    expect(orchestrator.syncSnapshot).not.toHaveBeenCalled();
  });
});
