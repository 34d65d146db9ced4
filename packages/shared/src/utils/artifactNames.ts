import { ARTIFACT_FILE_NAMES, ARTIFACT_KINDS, STABILITIES } from '../constants';
import type { ArtifactKind, LatestVersions, VersionsResponse } from '../types';

/**
 * Resolve an upstream asset / download file name to its artifact kind.
 * Returns null for names that are not published artifacts.
 */
export function artifactKindForFileName(fileName: string): ArtifactKind | null {
  for (const kind of ARTIFACT_KINDS) {
    if (ARTIFACT_FILE_NAMES[kind] === fileName) {
      return kind;
    }
  }
  return null;
}

export function fileNameForArtifactKind(kind: ArtifactKind): string {
  return ARTIFACT_FILE_NAMES[kind];
}

export function downloadPathFor(version: string, kind: ArtifactKind = 'binary'): string {
  return `/download/${encodeURIComponent(version)}/${fileNameForArtifactKind(kind)}`;
}

export function toVersionsResponse(latest: LatestVersions): VersionsResponse {
  const response: VersionsResponse = {};
  for (const stability of STABILITIES) {
    const info = latest[stability];
    if (!info) continue;
    response[stability] = {
      path: info.downloadPath,
      version: info.version,
      'min-php': info.minPlatformVersion
    };
  }
  return response;
}
