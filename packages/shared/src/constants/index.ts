// Release Stabilities
export const STABILITIES = ['stable', 'snapshot'] as const;

// Artifact Kinds
export const ARTIFACT_KINDS = ['binary', 'signature'] as const;

// File names published for each artifact kind (upstream asset names and bucket object names)
export const ARTIFACT_FILE_NAMES = {
  binary: 'svn-buddy.phar',
  signature: 'svn-buddy.phar.sig'
} as const;

// Oldest PHP version (PHP_VERSION_ID) the published phar runs on
export const MIN_PHP_VERSION = 50300;

// Snapshots older than this are removed, except the newest one
export const SNAPSHOT_RETENTION_WEEKS = 3;

// Bucket folder holding snapshot builds
export const SNAPSHOT_KEY_PREFIX = 'snapshots';

// Upstream repository whose GitHub releases feed the stable channel
export const UPSTREAM_REPOSITORY = {
  owner: 'console-helpers',
  repo: 'svn-buddy'
} as const;

// Release fields holding each artifact kind's URL
export const ARTIFACT_URL_FIELDS = {
  binary: 'pharArtifactUrl',
  signature: 'signatureArtifactUrl'
} as const;
