import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { UpstreamFetchError } from './errors';
import { GithubReleaseSource } from './githubReleases';

const fetchMock = vi.fn();

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), init);
}

function githubRelease(overrides: Record<string, unknown> = {}) {
  return {
    name: 'v1.2.0',
    tag_name: 'v1.2.0',
    draft: false,
    published_at: '2024-01-10T00:00:00Z',
    assets: [
      { name: 'svn-buddy.phar', browser_download_url: 'https://x/v1.2.0/svn-buddy.phar' }
    ],
    ...overrides
  };
}

describe('GithubReleaseSource', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps published releases and their assets', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([githubRelease()]));
    const source = new GithubReleaseSource({ timeoutMs: 5000 });

    const releases = await source.fetchReleases('console-helpers', 'svn-buddy');

    expect(releases).toEqual([
      {
        name: 'v1.2.0',
        publishedAt: new Date('2024-01-10T00:00:00Z'),
        assets: [{ name: 'svn-buddy.phar', url: 'https://x/v1.2.0/svn-buddy.phar' }]
      }
    ]);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://api.github.com/repos/console-helpers/svn-buddy/releases?per_page=100&page=1'
    );
  });

  it('sends GitHub headers and the bearer token when configured', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));
    const source = new GithubReleaseSource({ timeoutMs: 5000, token: 'test-token' });

    await source.fetchReleases('console-helpers', 'svn-buddy');

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init.headers).toEqual({
      Accept: 'application/vnd.github+json',
      'User-Agent': 'svn-buddy-updater',
      'X-GitHub-Api-Version': '2022-11-28',
      Authorization: 'Bearer test-token'
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('skips drafts and falls back to the tag name', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([
      githubRelease({ name: 'v2.0.0-draft', tag_name: 'v2.0.0', draft: true, published_at: null }),
      githubRelease({ name: '', tag_name: 'v1.1.0', published_at: '2023-12-01T08:30:00Z', assets: [] }),
      githubRelease({ name: null, tag_name: 'v1.0.0', published_at: '2023-11-01T08:30:00Z', assets: [] })
    ]));
    const source = new GithubReleaseSource({ timeoutMs: 5000 });

    const releases = await source.fetchReleases('console-helpers', 'svn-buddy');

    expect(releases.map((release) => release.name)).toEqual(['v1.1.0', 'v1.0.0']);
  });

  it('follows pages until a short page', async () => {
    const fullPage = Array.from({ length: 100 }, (_, i) =>
      githubRelease({ name: `v1.${i}.0`, tag_name: `v1.${i}.0`, assets: [] })
    );
    fetchMock
      .mockResolvedValueOnce(jsonResponse(fullPage))
      .mockResolvedValueOnce(jsonResponse([githubRelease({ name: 'v0.9.0', tag_name: 'v0.9.0' })]));
    const source = new GithubReleaseSource({ timeoutMs: 5000, baseUrl: 'https://github.example.com/api/v3/' });

    const releases = await source.fetchReleases('console-helpers', 'svn-buddy');

    expect(releases).toHaveLength(101);
    expect(releases[100]?.name).toBe('v0.9.0');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      'https://github.example.com/api/v3/repos/console-helpers/svn-buddy/releases?per_page=100&page=2'
    );
  });

  it('raises UpstreamFetchError on HTTP errors without retrying', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ message: 'API rate limit exceeded' }, { status: 403, statusText: 'Forbidden' })
    );
    const source = new GithubReleaseSource({ timeoutMs: 5000 });

    const error = await source.fetchReleases('console-helpers', 'svn-buddy').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({
      message: 'Failed to fetch releases of console-helpers/svn-buddy: HTTP 403 Forbidden: {"message":"API rate limit exceeded"}'
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('raises UpstreamFetchError on network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const source = new GithubReleaseSource({ timeoutMs: 5000 });

    await expect(source.fetchReleases('console-helpers', 'svn-buddy')).rejects.toThrow(
      'Failed to fetch releases of console-helpers/svn-buddy: fetch failed'
    );
  });

  it('raises UpstreamFetchError on an unexpected payload', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }));
    const source = new GithubReleaseSource({ timeoutMs: 5000 });

    const error = await source.fetchReleases('console-helpers', 'svn-buddy').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(String(error)).toContain('Unexpected release payload from console-helpers/svn-buddy');
  });
});
