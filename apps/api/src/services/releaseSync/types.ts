import type { ArtifactKind, LatestVersions, Release, Stability } from '@svn-buddy-updater/shared';

export type { ArtifactKind, Release, Stability };

export interface UpstreamAsset {
  name: string;
  url: string;
}

export interface UpstreamRelease {
  name: string;
  publishedAt: Date;
  assets: UpstreamAsset[];
}

export type CommitLookup =
  | { found: true; hash: string; committedAt: Date; cutoff: Date }
  | { found: false; cutoff: Date };

/** A checkout that must be released with `dispose()` once the caller is done with it. */
export interface DisposableCheckout {
  path: string;
  dispose(): Promise<void>;
}

export type ArtifactPaths = Record<ArtifactKind, string>;

export interface ReleaseCatalog {
  replaceStableReleases(releases: Release[]): Promise<void>;
  findSnapshotByVersion(versionName: string): Promise<Release | null>;
  insertSnapshot(release: Release): Promise<void>;
  latestPerStability(): Promise<Partial<Record<Stability, Release>>>;
  snapshotsOlderThan(cutoff: Date, excludingVersion: string): Promise<string[]>;
  deleteVersions(versionNames: string[]): Promise<void>;
  downloadUrl(version: string, fileName: string): Promise<string>;
}

export interface UpstreamReleaseSource {
  fetchReleases(owner: string, repo: string): Promise<UpstreamRelease[]>;
}

export interface SourceControlClient {
  checkout(ref: string): Promise<void>;
  pull(): Promise<void>;
  findCommitBeforeWeeklyCutoff(now: Date): Promise<CommitLookup>;
  createWorktree(ref: string): Promise<DisposableCheckout>;
}

export interface ArtifactBuilder {
  build(commitHash: string, outputDir: string): Promise<ArtifactPaths>;
}

export interface ArtifactStore {
  upload(files: string[], destinationPrefix: string): Promise<string[]>;
  deleteByKeys(keys: string[]): Promise<void>;
}

export interface ReleaseSyncDependencies {
  catalog: ReleaseCatalog;
  upstream: UpstreamReleaseSource;
  sourceControl: SourceControlClient;
  builder: ArtifactBuilder;
  store: ArtifactStore;
}

export interface ReleaseSyncConfig {
  upstream: { owner: string; repo: string };
  snapshotBranch: string;
  /** Local directory receiving snapshot build output, one subdirectory per commit. */
  snapshotsDir: string;
  snapshotKeyPrefix: string;
  /** Snapshots older than this many weeks are removed, except the newest one. */
  retentionWeeks: number;
  now?: () => Date;
}

export interface StableSyncResult {
  synced: number;
  versions: string[];
}

export interface SnapshotSyncResult {
  versionName: string;
  created: boolean;
  expired: string[];
}

export type { LatestVersions };
