import { and, asc, desc, eq, inArray, lt, max, ne, sql } from 'drizzle-orm';
import { fromUnixTime, getUnixTime } from 'date-fns';
import { ARTIFACT_URL_FIELDS, artifactKindForFileName } from '@svn-buddy-updater/shared';
import type { Database } from '../../db';
import { releases, type NewReleaseRow, type ReleaseRow } from '../../db/schema';
import { DuplicateVersionError } from './errors';
import type { Release, ReleaseCatalog, Stability } from './types';

// Byte order, independent of the database's default collation
const versionNameBytes = sql`${releases.versionName} collate "C"`;

const UNIQUE_VIOLATION = '23505';

function toRow(release: Release, stability: Stability): NewReleaseRow {
  return {
    versionName: release.versionName,
    releaseDate: getUnixTime(release.releaseDate),
    pharArtifactUrl: release.pharArtifactUrl,
    signatureArtifactUrl: release.signatureArtifactUrl,
    stability
  };
}

function toRelease(row: ReleaseRow): Release {
  return {
    versionName: row.versionName,
    releaseDate: fromUnixTime(row.releaseDate),
    pharArtifactUrl: row.pharArtifactUrl,
    signatureArtifactUrl: row.signatureArtifactUrl,
    stability: row.stability
  };
}

function readCode(value: unknown): string | undefined {
  if (!value || typeof value !== 'object' || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

// postgres.js raises the error itself; newer drizzle releases wrap it and keep it as `cause`
function isUniqueViolation(error: unknown): boolean {
  if (readCode(error) === UNIQUE_VIOLATION) return true;
  return error instanceof Error && readCode(error.cause) === UNIQUE_VIOLATION;
}

/**
 * Release catalog backed by the `releases` table.
 *
 * Latest-release tie-break: when several rows of one stability share the newest
 * `release_date`, the lexicographically greatest `version_name` is returned.
 */
export class DrizzleReleaseCatalog implements ReleaseCatalog {
  constructor(private readonly db: Database) {}

  async replaceStableReleases(stableReleases: Release[]): Promise<void> {
    const rows = stableReleases.map((release) => toRow(release, 'stable'));

    await this.db.transaction(async (tx) => {
      await tx.delete(releases).where(eq(releases.stability, 'stable'));
      if (rows.length > 0) {
        await tx.insert(releases).values(rows);
      }
    });
  }

  async findSnapshotByVersion(versionName: string): Promise<Release | null> {
    // Version names are unique across channels, so any row with this name blocks a rebuild
    const [row] = await this.db
      .select()
      .from(releases)
      .where(eq(releases.versionName, versionName))
      .limit(1);

    return row ? toRelease(row) : null;
  }

  async insertSnapshot(release: Release): Promise<void> {
    try {
      await this.db.insert(releases).values(toRow(release, 'snapshot'));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateVersionError(release.versionName, { cause: error });
      }
      throw error;
    }
  }

  async latestPerStability(): Promise<Partial<Record<Stability, Release>>> {
    const maxima = await this.db
      .select({ stability: releases.stability, releaseDate: max(releases.releaseDate) })
      .from(releases)
      .groupBy(releases.stability);

    const latest: Partial<Record<Stability, Release>> = {};

    for (const { stability, releaseDate } of maxima) {
      if (releaseDate === null) continue;

      const [row] = await this.db
        .select()
        .from(releases)
        .where(and(eq(releases.stability, stability), eq(releases.releaseDate, releaseDate)))
        .orderBy(desc(versionNameBytes))
        .limit(1);

      if (row) {
        latest[stability] = toRelease(row);
      }
    }

    return latest;
  }

  async snapshotsOlderThan(cutoff: Date, excludingVersion: string): Promise<string[]> {
    const rows = await this.db
      .select({ versionName: releases.versionName })
      .from(releases)
      .where(
        and(
          eq(releases.stability, 'snapshot'),
          lt(releases.releaseDate, getUnixTime(cutoff)),
          ne(releases.versionName, excludingVersion)
        )
      )
      .orderBy(asc(releases.releaseDate), asc(versionNameBytes));

    return rows.map((row) => row.versionName);
  }

  async deleteVersions(versionNames: string[]): Promise<void> {
    if (versionNames.length === 0) return;
    await this.db.delete(releases).where(inArray(releases.versionName, versionNames));
  }

  async downloadUrl(version: string, fileName: string): Promise<string> {
    const kind = artifactKindForFileName(fileName);
    if (!kind) return '';

    const [row] = await this.db
      .select({ url: releases[ARTIFACT_URL_FIELDS[kind]] })
      .from(releases)
      .where(eq(releases.versionName, version))
      .limit(1);

    return row?.url ?? '';
  }
}
