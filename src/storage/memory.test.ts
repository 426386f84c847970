import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStorage } from './memory';
import { IOError, NotFoundError } from '../errors';

describe('MemoryStorage', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  it('should run the upload, list, download and delete lifecycle', async () => {
    await storage.upload('v1.0.0', Buffer.from('A=1'));

    expect(await storage.exists('v1.0.0')).toBe(true);
    expect(await storage.list()).toEqual(['v1.0.0']);
    expect((await storage.download('v1.0.0')).toString()).toBe('A=1');

    await storage.delete('v1.0.0');

    expect(await storage.exists('v1.0.0')).toBe(false);
    expect(await storage.list()).toEqual([]);
  });

  it('should overwrite an existing tag', async () => {
    await storage.upload('main', Buffer.from('old'));
    await storage.upload('main', Buffer.from('new'));

    expect((await storage.download('main')).toString()).toBe('new');
    expect(storage.size).toBe(1);
  });

  it('should reject downloads of unknown tags', async () => {
    await expect(storage.download('missing')).rejects.toThrow(NotFoundError);
    await expect(storage.download('missing')).rejects.toThrow("Tag 'missing' not found");
  });

  it('should delete unknown tags silently', async () => {
    await expect(storage.delete('missing')).resolves.toBeUndefined();
  });

  it('should copy buffers in and out', async () => {
    const data = Buffer.from('A=1');
    await storage.upload('v1', data);
    data[0] = 0x5a;

    const downloaded = await storage.download('v1');
    downloaded[0] = 0x59;

    expect((await storage.download('v1')).toString()).toBe('A=1');
  });

  it('should store under the prefix and list only its tags', async () => {
    const prefixed = new MemoryStorage('envs/');
    await prefixed.upload('v1', Buffer.from('x'));
    await prefixed.upload('v2', Buffer.from('y'));

    expect((await prefixed.list()).sort()).toEqual(['v1', 'v2']);
  });

  it('should keep a consistent state under mixed concurrent operations', async () => {
    const tags = Array.from({ length: 20 }, (_, index) => `v${index}`);
    for (const tag of tags.slice(0, 10)) {
      await storage.upload(tag, Buffer.from(`old-${tag}`));
    }

    const results = await Promise.all(
      tags.flatMap(tag => [
        storage.upload(tag, Buffer.from(`new-${tag}`)).then(() => 'uploaded'),
        storage.exists(tag).then(found => (found ? 'found' : 'missing')),
        storage.download(tag).then(
          data => data.toString(),
          (error: unknown) => (error instanceof NotFoundError ? 'not-found' : 'failed')
        ),
        storage.list().then(listed => listed.length)
      ])
    );

    // Operations run in call order, so each tag's own upload lands before its exists/download.
    for (let index = 0; index < tags.length; index++) {
      const [uploaded, found, downloaded, listed] = results.slice(index * 4, index * 4 + 4);
      expect(uploaded).toBe('uploaded');
      expect(found).toBe('found');
      expect(downloaded).toBe(`new-${tags[index]}`);
      expect(listed).toBe(Math.max(10, index + 1));
    }
    expect((await storage.list()).sort()).toEqual([...tags].sort());
    expect(storage.size).toBe(20);
  });

  it('should fail every operation after failWith until reset', async () => {
    await storage.upload('v1', Buffer.from('x'));
    storage.failWith(new IOError('storage offline'));

    await expect(storage.list()).rejects.toThrow('storage offline');
    await expect(storage.upload('v2', Buffer.from('y'))).rejects.toThrow(IOError);
    await expect(storage.exists('v1')).rejects.toThrow(IOError);

    await storage.reset();

    expect(await storage.list()).toEqual([]);
    await storage.upload('v2', Buffer.from('y'));
    expect(await storage.exists('v2')).toBe(true);
  });
});
