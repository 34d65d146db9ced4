import { pgTable, pgEnum, text, bigint, index } from 'drizzle-orm/pg-core';
import { STABILITIES } from '@svn-buddy-updater/shared';

export const releaseStabilityEnum = pgEnum('release_stability', STABILITIES);

export const releases = pgTable('releases', {
  versionName: text('version_name').primaryKey(), // tag name (stable) or commit hash (snapshot)
  releaseDate: bigint('release_date', { mode: 'number' }).notNull(), // unix seconds
  pharArtifactUrl: text('phar_artifact_url').notNull().default(''),
  signatureArtifactUrl: text('signature_artifact_url').notNull().default(''),
  stability: releaseStabilityEnum('stability').notNull()
}, (table) => ({
  stabilityReleaseDateIdx: index('releases_stability_release_date_idx').on(table.stability, table.releaseDate)
}));

export type ReleaseRow = typeof releases.$inferSelect;
export type NewReleaseRow = typeof releases.$inferInsert;
