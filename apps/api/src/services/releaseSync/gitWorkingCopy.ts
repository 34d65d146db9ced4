import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatISO, fromUnixTime, startOfISOWeek, subSeconds } from 'date-fns';
import { runCommand } from '../../utils/runCommand';
import { SourceControlError, errorMessage } from './errors';
import type { CommitLookup, DisposableCheckout, SourceControlClient } from './types';

const LOG_LINE_PATTERN = /^([0-9a-f]{40,64}):(\d+)$/;

export interface GitWorkingCopyOptions {
  repositoryPath: string;
  timeoutMs: number;
  /** Parent directory for disposable worktrees (defaults to the OS temp dir). */
  worktreeRoot?: string;
}

/** Monday 00:00 (local time) of the ISO week containing `now`. */
export function weeklyCutoff(now: Date): Date {
  return startOfISOWeek(now);
}

/**
 * Git CLI operations against the single shared working copy the snapshots are cut from.
 */
export class GitWorkingCopy implements SourceControlClient {
  constructor(private readonly options: GitWorkingCopyOptions) {}

  private async git(args: string[]): Promise<string> {
    try {
      const { stdout } = await runCommand('git', args, {
        cwd: this.options.repositoryPath,
        // A credential prompt would block until the timeout
        env: { GIT_TERMINAL_PROMPT: '0' },
        timeoutMs: this.options.timeoutMs
      });
      return stdout;
    } catch (error) {
      throw new SourceControlError(`git ${args[0] ?? ''} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async checkout(ref: string): Promise<void> {
    await this.git(['checkout', ref]);
  }

  async pull(): Promise<void> {
    await this.git(['pull', '--ff-only']);
  }

  async findCommitBeforeWeeklyCutoff(now: Date): Promise<CommitLookup> {
    const cutoff = weeklyCutoff(now);
    // --before is inclusive, step back one second to keep the cutoff itself out
    const output = await this.git([
      'log',
      '--format=%H:%ct',
      '--max-count=1',
      `--before=${formatISO(subSeconds(cutoff, 1))}`
    ]);

    const line = output.trim();
    if (!line) {
      return { found: false, cutoff };
    }

    const match = LOG_LINE_PATTERN.exec(line);
    if (!match || !match[1] || !match[2]) {
      throw new SourceControlError(`Unexpected git log output: ${line.slice(0, 200)}`);
    }

    return {
      found: true,
      hash: match[1],
      committedAt: fromUnixTime(Number(match[2])),
      cutoff
    };
  }

  async createWorktree(ref: string): Promise<DisposableCheckout> {
    const path = await mkdtemp(join(this.options.worktreeRoot ?? tmpdir(), 'svn-buddy-build-'));

    try {
      await this.git(['worktree', 'add', '--detach', '--force', path, ref]);
    } catch (error) {
      await rm(path, { recursive: true, force: true });
      throw error;
    }

    return {
      path,
      dispose: async () => {
        try {
          await this.git(['worktree', 'remove', '--force', path]);
        } finally {
          await rm(path, { recursive: true, force: true });
          await this.git(['worktree', 'prune']);
        }
      }
    };
  }
}
