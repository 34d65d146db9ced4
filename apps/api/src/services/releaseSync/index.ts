import { buildReleaseSyncConfig, getConfig, type AppConfig } from '../../config/validate';
import { db } from '../../db';
import { S3ArtifactStore, createS3Client } from './artifactStore';
import { DrizzleReleaseCatalog } from './catalog';
import { GithubReleaseSource } from './githubReleases';
import { GitWorkingCopy } from './gitWorkingCopy';
import { ReleaseSyncOrchestrator } from './orchestrator';
import { PharArtifactBuilder } from './pharBuilder';

export { ReleaseSyncOrchestrator } from './orchestrator';
export * from './errors';
export type * from './types';

export function createReleaseSyncOrchestrator(config: AppConfig): ReleaseSyncOrchestrator {
  const sourceControl = new GitWorkingCopy({
    repositoryPath: config.REPOSITORY_PATH,
    timeoutMs: config.COMMAND_TIMEOUT_MS
  });

  const s3Client = createS3Client({
    region: config.S3_REGION,
    endpoint: config.S3_ENDPOINT,
    accessKeyId: config.S3_ACCESS_KEY,
    secretAccessKey: config.S3_SECRET_KEY
  });

  return new ReleaseSyncOrchestrator(
    {
      catalog: new DrizzleReleaseCatalog(db),
      upstream: new GithubReleaseSource({
        token: config.GITHUB_TOKEN,
        timeoutMs: config.GITHUB_TIMEOUT_MS
      }),
      sourceControl,
      builder: new PharArtifactBuilder(sourceControl, {
        command: config.SNAPSHOT_BUILD_COMMAND,
        prepareCommand: config.SNAPSHOT_PREPARE_COMMAND,
        timeoutMs: config.BUILD_TIMEOUT_MS
      }),
      store: new S3ArtifactStore(s3Client, {
        bucket: config.S3_BUCKET,
        region: config.S3_REGION,
        endpoint: config.S3_ENDPOINT,
        publicBaseUrl: config.S3_PUBLIC_URL,
        timeoutMs: config.S3_TIMEOUT_MS
      })
    },
    buildReleaseSyncConfig(config)
  );
}

let orchestrator: ReleaseSyncOrchestrator | null = null;

/** Process-wide orchestrator built from the validated config. */
export function getReleaseSyncOrchestrator(): ReleaseSyncOrchestrator {
  if (!orchestrator) {
    orchestrator = createReleaseSyncOrchestrator(getConfig());
  }
  return orchestrator;
}
