import { DeleteObjectsCommand, PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  stat: vi.fn(),
  createReadStream: vi.fn()
}));

vi.mock('node:fs', () => ({
  createReadStream: mocks.createReadStream
}));

vi.mock('node:fs/promises', () => ({
  stat: mocks.stat
}));

import { createS3Client, S3ArtifactStore } from './artifactStore';
import { StorageError } from './errors';

const HASH = '9f86d081884c7d659a2feaa0c55ad015a3bf4f1b';

function createStore(overrides: Partial<ConstructorParameters<typeof S3ArtifactStore>[1]> = {}) {
  const send = vi.fn().mockResolvedValue({});
  const store = new S3ArtifactStore({ send } as unknown as S3Client, {
    bucket: 'svn-buddy-artifacts',
    region: 'eu-west-1',
    timeoutMs: 30000,
    ...overrides
  });
  return { store, send };
}

describe('S3ArtifactStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.stat.mockResolvedValue({ size: 2048 });
    mocks.createReadStream.mockImplementation((path: string) => ({ path }));
  });

  describe('publicUrl', () => {
    it('uses the virtual-hosted AWS URL by default', () => {
      const { store } = createStore();
      expect(store.publicUrl(`snapshots/${HASH}/svn-buddy.phar`))
        .toBe(`https://svn-buddy-artifacts.s3.eu-west-1.amazonaws.com/snapshots/${HASH}/svn-buddy.phar`);
    });

    it('uses path-style URLs for custom endpoints', () => {
      const { store } = createStore({ endpoint: 'http://localhost:9000/' });
      expect(store.publicUrl('snapshots/abc/svn-buddy.phar'))
        .toBe('http://localhost:9000/svn-buddy-artifacts/snapshots/abc/svn-buddy.phar');
    });

    it('prefers the configured public base URL', () => {
      const { store } = createStore({ endpoint: 'http://localhost:9000', publicBaseUrl: 'https://cdn.example.com/' });
      expect(store.publicUrl('snapshots/abc/svn-buddy.phar.sig'))
        .toBe('https://cdn.example.com/snapshots/abc/svn-buddy.phar.sig');
    });
  });

  describe('upload', () => {
    it('uploads each file as a public object and returns URLs in input order', async () => {
      const { store, send } = createStore();

      const urls = await store.upload(
        [`/srv/snapshots/${HASH}/svn-buddy.phar`, `/srv/snapshots/${HASH}/svn-buddy.phar.sig`],
        `snapshots/${HASH}`
      );

      expect(urls).toEqual([
        `https://svn-buddy-artifacts.s3.eu-west-1.amazonaws.com/snapshots/${HASH}/svn-buddy.phar`,
        `https://svn-buddy-artifacts.s3.eu-west-1.amazonaws.com/snapshots/${HASH}/svn-buddy.phar.sig`
      ]);
      expect(send).toHaveBeenCalledTimes(2);

      const [command, options] = send.mock.calls[0] ?? [];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'svn-buddy-artifacts',
        Key: `snapshots/${HASH}/svn-buddy.phar`,
        Body: { path: `/srv/snapshots/${HASH}/svn-buddy.phar` },
        ContentLength: 2048,
        ContentType: 'application/octet-stream',
        ACL: 'public-read'
      });
      expect(options.abortSignal).toBeInstanceOf(AbortSignal);
    });

    it('stops at the first failed upload', async () => {
      const { store, send } = createStore();
      send.mockRejectedValueOnce(new Error('AccessDenied'));

      const error = await store.upload(['/out/svn-buddy.phar', '/out/svn-buddy.phar.sig'], 'snapshots/abc')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: 'Failed to upload /out/svn-buddy.phar to snapshots/abc/svn-buddy.phar: AccessDenied'
      });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('fails when a local file cannot be read', async () => {
      const { store, send } = createStore();
      mocks.stat.mockRejectedValue(new Error('ENOENT: no such file'));

      await expect(store.upload(['/out/svn-buddy.phar'], 'snapshots/abc')).rejects.toBeInstanceOf(StorageError);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('deleteByKeys', () => {
    it('deletes keys in one batch', async () => {
      const { store, send } = createStore();

      await store.deleteByKeys(['snapshots/aaa/svn-buddy.phar', 'snapshots/aaa/svn-buddy.phar.sig', 'snapshots/aaa']);

      const [command] = send.mock.calls[0] ?? [];
      expect(command).toBeInstanceOf(DeleteObjectsCommand);
      expect(command.input).toEqual({
        Bucket: 'svn-buddy-artifacts',
        Delete: {
          Objects: [
            { Key: 'snapshots/aaa/svn-buddy.phar' },
            { Key: 'snapshots/aaa/svn-buddy.phar.sig' },
            { Key: 'snapshots/aaa' }
          ],
          Quiet: true
        }
      });
    });

    it('splits large deletes into batches of 1000', async () => {
      const { store, send } = createStore();
      const keys = Array.from({ length: 2001 }, (_, i) => `snapshots/v${i}`);

      await store.deleteByKeys(keys);

      expect(send).toHaveBeenCalledTimes(3);
      expect(send.mock.calls[2]?.[0].input.Delete.Objects).toEqual([{ Key: 'snapshots/v2000' }]);
    });

    it('does not call S3 for an empty list', async () => {
      const { store, send } = createStore();

      await store.deleteByKeys([]);

      expect(send).not.toHaveBeenCalled();
    });

    it('raises StorageError for per-key errors', async () => {
      const { store, send } = createStore();
      send.mockResolvedValue({ Errors: [{ Key: 'snapshots/aaa/svn-buddy.phar', Code: 'AccessDenied' }] });

      await expect(store.deleteByKeys(['snapshots/aaa/svn-buddy.phar'])).rejects.toThrow(
        'Failed to delete 1 object(s): snapshots/aaa/svn-buddy.phar (AccessDenied)'
      );
    });

    it('raises StorageError when the request is rejected', async () => {
      const { store, send } = createStore();
      send.mockRejectedValue(new Error('MalformedXML'));

      await expect(store.deleteByKeys(['snapshots/aaa'])).rejects.toThrow('Failed to delete 1 object(s): MalformedXML');
    });
  });
});

describe('createS3Client', () => {
  it('enables path-style addressing for custom endpoints', () => {
    const client = createS3Client({ region: 'us-east-1', endpoint: 'http://localhost:9000', accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
    expect(client.config.forcePathStyle).toBe(true);
  });

  it('uses virtual-hosted addressing against AWS', () => {
    const client = createS3Client({ region: 'eu-west-1' });
    expect(client.config.forcePathStyle).toBe(false);
  });
});
