/**
 * Media cache: downloads story images into a deterministic local layout.
 *
 * Layout: {root}/images/[{subdir}/]{slug}/{name}{ext}
 * Existing files are never re-fetched or refreshed.
 */

import fs from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Fetcher } from './tools/fetcher';
import { urlPath } from './tools/url';
import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

export const DEFAULT_IMAGE_EXTENSION = '.jpg';
const MAX_EXTENSION_LENGTH = 4;

export function resolveExtension(url: string): string {
  const extension = path.posix.extname(urlPath(url));
  if (extension.length <= 1 || extension.length - 1 > MAX_EXTENSION_LENGTH) {
    return DEFAULT_IMAGE_EXTENSION;
  }
  return extension;
}

/** Path of an asset relative to the cache root, always with forward slashes. */
export function mediaRelativePath(slug: string, name: string, extension: string, subdir?: string): string {
  const segments = ['images'];
  if (subdir) segments.push(subdir);
  segments.push(slug, `${name}${extension}`);
  return path.posix.join(...segments);
}

async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class MediaCache {
  private readonly root: string;

  constructor(root: string, private readonly fetcher: Fetcher) {
    this.root = path.resolve(root);
  }

  /**
   * Make sure the asset exists locally and return its root-relative path,
   * or null when it could not be downloaded.
   */
  async ensure(url: string, slug: string, name: string, subdir?: string): Promise<string | null> {
    const relativePath = mediaRelativePath(slug, name, resolveExtension(url), subdir);
    const target = path.resolve(this.root, ...relativePath.split('/'));

    const relative = path.relative(this.root, target);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      logger.warn(`Refusing to write image outside of data root: ${relativePath}`);
      return null;
    }

    if (await fileExists(target)) {
      logger.debug(`Image already cached: ${relativePath}`);
      return relativePath;
    }

    const partial = `${target}.part`;
    let body: Readable | undefined;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      body = await this.fetcher.fetchStream(url);
      // Open before streaming so the part file exists by the time any cleanup runs
      const handle = await fs.open(partial, 'w');
      await pipeline(body, handle.createWriteStream());
      await fs.rename(partial, target);
      logger.info(`Downloaded image: ${relativePath}`);
      return relativePath;
    } catch (error) {
      body?.destroy();
      await fs.rm(partial, { force: true });
      logger.warn(`Error downloading image ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  /** Download body images as image_1..image_n, keeping only successes in order. */
  async ensureAll(urls: string[], slug: string, subdir?: string): Promise<string[]> {
    const localPaths: string[] = [];
    for (const [index, url] of urls.entries()) {
      const localPath = await this.ensure(url, slug, `image_${index + 1}`, subdir);
      if (localPath) {
        localPaths.push(localPath);
      }
    }
    return localPaths;
  }
}
