import type { ARTIFACT_KINDS, STABILITIES } from '../constants';

// ============================================
// Release Types
// ============================================

export type Stability = (typeof STABILITIES)[number];
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export interface Release {
  versionName: string;
  releaseDate: Date;
  pharArtifactUrl: string;
  signatureArtifactUrl: string;
  stability: Stability;
}

export interface LatestVersionInfo {
  downloadPath: string;
  version: string;
  minPlatformVersion: number;
}

export type LatestVersions = Partial<Record<Stability, LatestVersionInfo>>;

// ============================================
// Update Check Wire Format
// ============================================

/** Shape the svn-buddy self-update command reads from `GET /versions`. */
export interface VersionsResponseEntry {
  path: string;
  version: string;
  'min-php': number;
}

export type VersionsResponse = Partial<Record<Stability, VersionsResponseEntry>>;
