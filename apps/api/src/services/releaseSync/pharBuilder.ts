import { mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { ARTIFACT_KINDS, fileNameForArtifactKind } from '@svn-buddy-updater/shared';
import { runCommand } from '../../utils/runCommand';
import { BuildError, errorMessage } from './errors';
import type { ArtifactBuilder, ArtifactKind, ArtifactPaths, SourceControlClient } from './types';

export interface PharBuilderOptions {
  /** Build command run inside the checkout; `--build-dir=<outputDir>` is appended. */
  command: string[];
  /** Dependency install run inside the checkout before the build; skipped when empty. */
  prepareCommand?: string[];
  timeoutMs: number;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Builds the phar and its signature for one commit, in a disposable worktree so the
 * shared working copy keeps its checked-out branch.
 */
export class PharArtifactBuilder implements ArtifactBuilder {
  constructor(
    private readonly sourceControl: SourceControlClient,
    private readonly options: PharBuilderOptions
  ) {}

  async build(commitHash: string, outputDir: string): Promise<ArtifactPaths> {
    const [executable, ...args] = this.options.command;
    if (!executable) {
      throw new BuildError('Snapshot build command is empty');
    }

    await mkdir(outputDir, { recursive: true });
    const checkout = await this.sourceControl.createWorktree(commitHash);

    try {
      const [prepareExecutable, ...prepareArgs] = this.options.prepareCommand ?? [];
      if (prepareExecutable) {
        try {
          await runCommand(prepareExecutable, prepareArgs, {
            cwd: checkout.path,
            timeoutMs: this.options.timeoutMs
          });
        } catch (error) {
          throw new BuildError(`Preparing build of ${commitHash} failed: ${errorMessage(error)}`, { cause: error });
        }
      }

      try {
        await runCommand(executable, [...args, `--build-dir=${outputDir}`], {
          cwd: checkout.path,
          timeoutMs: this.options.timeoutMs
        });
      } catch (error) {
        throw new BuildError(`Build of ${commitHash} failed: ${errorMessage(error)}`, { cause: error });
      }

      const paths = {
        binary: join(outputDir, fileNameForArtifactKind('binary')),
        signature: join(outputDir, fileNameForArtifactKind('signature'))
      } satisfies ArtifactPaths;

      const missing: ArtifactKind[] = [];
      for (const kind of ARTIFACT_KINDS) {
        if (!(await isFile(paths[kind]))) {
          missing.push(kind);
        }
      }
      if (missing.length > 0) {
        const names = missing.map((kind) => fileNameForArtifactKind(kind)).join(', ');
        throw new BuildError(`Build of ${commitHash} did not produce ${names} in ${outputDir}`);
      }

      return paths;
    } finally {
      try {
        await checkout.dispose();
      } catch (error) {
        console.error(`[PharArtifactBuilder] Failed to remove worktree ${checkout.path}:`, error);
      }
    }
  }
}
