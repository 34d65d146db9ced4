export class ReleaseSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReleaseSyncError';
  }
}

/** GitHub could not be reached, rejected the request, or answered with an unexpected payload. */
export class UpstreamFetchError extends ReleaseSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamFetchError';
  }
}

export class SourceControlError extends ReleaseSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceControlError';
  }
}

export class NoEligibleCommitError extends ReleaseSyncError {
  readonly cutoff: Date;

  constructor(cutoff: Date) {
    super(`No snapshot-eligible commit found before ${cutoff.toISOString()}`);
    this.name = 'NoEligibleCommitError';
    this.cutoff = cutoff;
  }
}

export class BuildError extends ReleaseSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BuildError';
  }
}

export class StorageError extends ReleaseSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class DuplicateVersionError extends ReleaseSyncError {
  readonly versionName: string;

  constructor(versionName: string, options?: { cause?: unknown }) {
    super(`Release ${versionName} already exists`, options);
    this.name = 'DuplicateVersionError';
    this.versionName = versionName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
