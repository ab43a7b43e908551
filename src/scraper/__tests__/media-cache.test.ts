import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { exists, FakeFetcher, makeTempDir, removeDir } from '../../__tests__/helpers';
import { TransportError } from '../../types/errors';
import { MediaCache, mediaRelativePath, resolveExtension } from '../media-cache';

describe('resolveExtension', () => {
  it.each([
    ['https://x/a.jpg?x=1', '.jpg'],
    ['https://x/photo.jpeg', '.jpeg'],
    ['https://x/img.PNG#top', '.PNG'],
    ['https://x/file.webpx', '.jpg'],
    ['https://x/no-extension', '.jpg'],
    ['https://x/dir.v2/file', '.jpg'],
    ['https://x/trailing.', '.jpg']
  ])('%s -> %s', (url, expected) => {
    expect(resolveExtension(url)).toBe(expected);
  });
});

describe('mediaRelativePath', () => {
  it('places the optional subdirectory before the slug', () => {
    expect(mediaRelativePath('s1', 'hero', '.jpg')).toBe('images/s1/hero.jpg');
    expect(mediaRelativePath('s1', 'image_2', '.png', 'daily_star')).toBe('images/daily_star/s1/image_2.png');
  });
});

describe('MediaCache', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('downloads once and serves the cached file afterwards', async () => {
    const fetcher = new FakeFetcher({}, { 'https://x/a.jpg?x=1': 'image-bytes' });
    const cache = new MediaCache(root, fetcher);

    const first = await cache.ensure('https://x/a.jpg?x=1', 's1', 'hero');
    expect(first).toBe('images/s1/hero.jpg');
    expect(fetcher.streamCalls).toHaveLength(1);
    await expect(fs.readFile(path.join(root, 'images', 's1', 'hero.jpg'), 'utf-8')).resolves.toBe('image-bytes');

    const second = await cache.ensure('https://x/a.jpg?x=1', 's1', 'hero');
    expect(second).toBe(first);
    expect(fetcher.streamCalls).toHaveLength(1);
  });

  it('writes into the source subdirectory', async () => {
    const fetcher = new FakeFetcher({}, { 'https://cdn.example.com/p/photo.png': 'png' });
    const cache = new MediaCache(root, fetcher);

    const local = await cache.ensure('https://cdn.example.com/p/photo.png', 'story', 'image_1', 'daily_star');

    expect(local).toBe('images/daily_star/story/image_1.png');
    expect(await exists(path.join(root, 'images', 'daily_star', 'story', 'image_1.png'))).toBe(true);
  });

  it('returns null and leaves no file when the fetch fails', async () => {
    const url = 'https://x/missing.jpg';
    const fetcher = new FakeFetcher({}, { [url]: new TransportError(url, 'HTTP 500: Server Error', { status: 500 }) });
    const cache = new MediaCache(root, fetcher);

    await expect(cache.ensure(url, 's1', 'hero')).resolves.toBeNull();
    expect(await exists(path.join(root, 'images', 's1', 'hero.jpg'))).toBe(false);
    expect(await exists(path.join(root, 'images', 's1', 'hero.jpg.part'))).toBe(false);
  });

  it('removes a partial download so the next call fetches again', async () => {
    const url = 'https://x/flaky.jpg';
    let attempts = 0;
    const fetcher = new FakeFetcher({}, {
      [url]: () => {
        attempts += 1;
        if (attempts === 1) {
          return new Readable({
            read() {
              this.push(Buffer.from('half-an-im'));
              this.destroy(new Error('connection reset'));
            }
          });
        }
        return Readable.from([Buffer.from('whole-image')]);
      }
    });
    const cache = new MediaCache(root, fetcher);
    const target = path.join(root, 'images', 's1', 'image_1.jpg');

    await expect(cache.ensure(url, 's1', 'image_1')).resolves.toBeNull();
    expect(await exists(target)).toBe(false);
    expect(await exists(`${target}.part`)).toBe(false);

    await expect(cache.ensure(url, 's1', 'image_1')).resolves.toBe('images/s1/image_1.jpg');
    expect(fetcher.streamCalls).toHaveLength(2);
    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('whole-image');
  });

  it('releases the response stream when the file cannot be opened', async () => {
    const body = Readable.from([Buffer.from('bytes')]);
    const fetcher = new FakeFetcher({}, { 'https://x/a.jpg': () => body });
    const cache = new MediaCache(root, fetcher);
    jest.spyOn(fs, 'open').mockRejectedValueOnce(new Error('EMFILE: too many open files'));

    await expect(cache.ensure('https://x/a.jpg', 's1', 'hero')).resolves.toBeNull();
    expect(body.destroyed).toBe(true);
  });

  it('refuses targets outside the data root', async () => {
    const fetcher = new FakeFetcher({}, { 'https://x/a.jpg': 'bytes' });
    const cache = new MediaCache(root, fetcher);

    await expect(cache.ensure('https://x/a.jpg', '../../escape', 'hero')).resolves.toBeNull();
    expect(fetcher.streamCalls).toHaveLength(0);
  });

  it('numbers body images in order and omits failures', async () => {
    const fetcher = new FakeFetcher({}, {
      'https://x/one.jpg': '1',
      'https://x/three.png': '3'
    });
    const cache = new MediaCache(root, fetcher);

    const local = await cache.ensureAll(
      ['https://x/one.jpg', 'https://x/two.jpg', 'https://x/three.png'],
      'story'
    );

    expect(local).toEqual(['images/story/image_1.jpg', 'images/story/image_3.png']);
  });
});
