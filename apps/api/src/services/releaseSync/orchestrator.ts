import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { subWeeks } from 'date-fns';
import {
  ARTIFACT_KINDS,
  ARTIFACT_URL_FIELDS,
  MIN_PHP_VERSION,
  STABILITIES,
  artifactKindForFileName,
  downloadPathFor,
  fileNameForArtifactKind
} from '@svn-buddy-updater/shared';
import { NoEligibleCommitError, StorageError } from './errors';
import type {
  LatestVersions,
  Release,
  ReleaseSyncConfig,
  ReleaseSyncDependencies,
  SnapshotSyncResult,
  StableSyncResult,
  UpstreamAsset,
  UpstreamRelease
} from './types';

type ArtifactUrls = Pick<Release, 'pharArtifactUrl' | 'signatureArtifactUrl'>;

function mapAssets(assets: UpstreamAsset[]): ArtifactUrls {
  const urls: ArtifactUrls = { pharArtifactUrl: '', signatureArtifactUrl: '' };
  for (const asset of assets) {
    const kind = artifactKindForFileName(asset.name);
    if (kind) {
      urls[ARTIFACT_URL_FIELDS[kind]] = asset.url;
    }
  }
  return urls;
}

function toStableReleases(upstream: UpstreamRelease[]): Release[] {
  const seen = new Set<string>();
  const releases: Release[] = [];

  for (const release of upstream) {
    if (seen.has(release.name)) {
      console.warn(`[ReleaseSync] Ignoring duplicate upstream release ${release.name}`);
      continue;
    }
    seen.add(release.name);
    releases.push({
      versionName: release.name,
      releaseDate: release.publishedAt,
      ...mapAssets(release.assets),
      stability: 'stable'
    });
  }

  return releases;
}

/**
 * Keeps the release catalog in step with upstream stable releases and weekly
 * snapshot builds, and answers the update-check queries served to clients.
 */
export class ReleaseSyncOrchestrator {
  private snapshotRun: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly deps: ReleaseSyncDependencies,
    private readonly config: ReleaseSyncConfig
  ) {}

  private now(): Date {
    return this.config.now ? this.config.now() : new Date();
  }

  async syncStable(): Promise<StableSyncResult> {
    const { owner, repo } = this.config.upstream;
    const startTime = Date.now();

    const upstream = await this.deps.upstream.fetchReleases(owner, repo);
    const releases = toStableReleases(upstream);
    await this.deps.catalog.replaceStableReleases(releases);

    console.log(`[ReleaseSync] Synced ${releases.length} stable release(s) from ${owner}/${repo} in ${Date.now() - startTime}ms`);
    return { synced: releases.length, versions: releases.map((release) => release.versionName) };
  }

  /**
   * Runs one snapshot pass. Calls on the same instance are queued, since every pass
   * checks out and pulls the shared working copy.
   */
  syncSnapshot(): Promise<SnapshotSyncResult> {
    const run = this.snapshotRun.then(() => this.runSnapshotSync());
    // The queue only orders passes; each caller still receives its own failure through `run`
    this.snapshotRun = run.catch(() => undefined);
    return run;
  }

  private async runSnapshotSync(): Promise<SnapshotSyncResult> {
    const { sourceControl, catalog } = this.deps;
    const { snapshotBranch, snapshotsDir } = this.config;

    await sourceControl.checkout(snapshotBranch);
    await sourceControl.pull();

    const lookup = await sourceControl.findCommitBeforeWeeklyCutoff(this.now());
    if (!lookup.found) {
      throw new NoEligibleCommitError(lookup.cutoff);
    }

    const { hash, committedAt } = lookup;
    let created = false;

    if (await catalog.findSnapshotByVersion(hash)) {
      console.log(`[ReleaseSync] Snapshot ${hash} already published, skipping build`);
    } else {
      const urls = await this.buildAndUpload(hash, join(snapshotsDir, hash));

      const release: Release = {
        versionName: hash,
        releaseDate: committedAt,
        pharArtifactUrl: '',
        signatureArtifactUrl: '',
        stability: 'snapshot'
      };
      ARTIFACT_KINDS.forEach((kind, index) => {
        release[ARTIFACT_URL_FIELDS[kind]] = urls[index] ?? '';
      });

      await catalog.insertSnapshot(release);
      created = true;
      console.log(`[ReleaseSync] Published snapshot ${hash} (committed ${committedAt.toISOString()})`);
    }

    const expired = await this.sweepExpiredSnapshots();
    return { versionName: hash, created, expired };
  }

  /**
   * Removes snapshots older than the retention window, never the newest one.
   * Each version's objects are deleted before its catalog row.
   */
  async sweepExpiredSnapshots(): Promise<string[]> {
    const { catalog, store } = this.deps;

    const latest = (await catalog.latestPerStability()).snapshot;
    if (!latest) {
      return [];
    }

    const cutoff = subWeeks(this.now(), this.config.retentionWeeks);
    const expired = await catalog.snapshotsOlderThan(cutoff, latest.versionName);
    const removed: string[] = [];

    for (const versionName of expired) {
      await store.deleteByKeys(this.snapshotKeys(versionName));
      await catalog.deleteVersions([versionName]);
      removed.push(versionName);
    }

    if (removed.length > 0) {
      console.log(`[ReleaseSync] Removed ${removed.length} expired snapshot(s) older than ${cutoff.toISOString()}`);
    }
    return removed;
  }

  async latestVersionsForStability(): Promise<LatestVersions> {
    const latest = await this.deps.catalog.latestPerStability();
    const versions: LatestVersions = {};

    for (const stability of STABILITIES) {
      const release = latest[stability];
      if (!release) continue;
      versions[stability] = {
        downloadPath: downloadPathFor(release.versionName),
        version: release.versionName,
        minPlatformVersion: MIN_PHP_VERSION
      };
    }

    return versions;
  }

  downloadUrl(version: string, fileName: string): Promise<string> {
    return this.deps.catalog.downloadUrl(version, fileName);
  }

  /** Local build output is removed once the upload settles, whether or not it succeeded. */
  private async buildAndUpload(hash: string, outputDir: string): Promise<string[]> {
    const { builder, store } = this.deps;
    try {
      const paths = await builder.build(hash, outputDir);
      const files = ARTIFACT_KINDS.map((kind) => paths[kind]);
      const urls = await store.upload(files, this.snapshotPrefix(hash));
      if (urls.length !== files.length) {
        throw new StorageError(`Upload of snapshot ${hash} returned ${urls.length} URL(s) for ${files.length} file(s)`);
      }
      return urls;
    } finally {
      await this.removeBuildOutput(outputDir);
    }
  }

  private async removeBuildOutput(outputDir: string): Promise<void> {
    try {
      await rm(outputDir, { recursive: true, force: true });
    } catch (error) {
      console.error(`[ReleaseSync] Failed to remove build output ${outputDir}:`, error);
    }
  }

  private snapshotPrefix(versionName: string): string {
    return `${this.config.snapshotKeyPrefix}/${versionName}`;
  }

  private snapshotKeys(versionName: string): string[] {
    const prefix = this.snapshotPrefix(versionName);
    return [...ARTIFACT_KINDS.map((kind) => `${prefix}/${fileNameForArtifactKind(kind)}`), prefix];
  }
}
