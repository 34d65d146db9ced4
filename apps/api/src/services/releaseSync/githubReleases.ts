import { z } from 'zod';
import { UpstreamFetchError, errorMessage } from './errors';
import { requestJson } from './http';
import type { UpstreamRelease, UpstreamReleaseSource } from './types';

const GITHUB_API_URL = 'https://api.github.com';
const PAGE_SIZE = 100;
const MAX_PAGES = 20;

const githubAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url()
});

const githubReleaseSchema = z.object({
  name: z.string().nullable().optional(),
  tag_name: z.string().min(1),
  draft: z.boolean().optional().default(false),
  published_at: z.string().datetime({ offset: true }).nullable(),
  assets: z.array(githubAssetSchema).default([])
});

const githubReleasePageSchema = z.array(githubReleaseSchema);

type GithubRelease = z.infer<typeof githubReleaseSchema>;

export interface GithubReleaseSourceOptions {
  token?: string;
  timeoutMs: number;
  baseUrl?: string;
}

function toUpstreamRelease(release: GithubRelease): UpstreamRelease | null {
  if (release.draft || !release.published_at) {
    return null;
  }

  const name = release.name?.trim() || release.tag_name;
  return {
    name,
    publishedAt: new Date(release.published_at),
    assets: release.assets.map((asset) => ({ name: asset.name, url: asset.browser_download_url }))
  };
}

/**
 * Lists published releases of a GitHub repository, newest first as GitHub returns them.
 */
export class GithubReleaseSource implements UpstreamReleaseSource {
  constructor(private readonly options: GithubReleaseSourceOptions) {}

  async fetchReleases(owner: string, repo: string): Promise<UpstreamRelease[]> {
    const releases: UpstreamRelease[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const batch = await this.fetchPage(owner, repo, page);

      for (const release of batch) {
        const mapped = toUpstreamRelease(release);
        if (mapped) releases.push(mapped);
      }

      if (batch.length < PAGE_SIZE) {
        return releases;
      }
    }

    console.warn(`[GithubReleaseSource] Stopped after ${MAX_PAGES} pages of ${owner}/${repo} releases`);
    return releases;
  }

  private async fetchPage(owner: string, repo: string, page: number): Promise<GithubRelease[]> {
    const baseUrl = (this.options.baseUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
    const url = new URL(`${baseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/releases`);
    url.searchParams.set('per_page', String(PAGE_SIZE));
    url.searchParams.set('page', String(page));

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'svn-buddy-updater',
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    let body: unknown;
    try {
      body = await requestJson(url, { headers, timeoutMs: this.options.timeoutMs });
    } catch (error) {
      throw new UpstreamFetchError(`Failed to fetch releases of ${owner}/${repo}: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = githubReleasePageSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
      throw new UpstreamFetchError(`Unexpected release payload from ${owner}/${repo}: ${detail}`, { cause: parsed.error });
    }

    return parsed.data;
  }
}
