/**
 * Saving and loading scrape artifacts:
 * { source, scraped_at, story_count, stories }
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { FullRecord } from '../../types/adapter';
import { logger } from '../../utils/logger';

const fullRecordSchema = z.object({
  slug: z.string().min(1),
  headline: z.string().min(1),
  url: z.string().min(1),
  last_published_at: z.string().nullable(),
  hero_image_url: z.string().nullable(),
  scraped_at: z.string(),
  description: z.string(),
  image_urls: z.array(z.string()),
  local_images: z.array(z.string()),
  hero_image_local: z.string().nullable()
});

export const scrapeArtifactSchema = z.object({
  source: z.string(),
  scraped_at: z.string(),
  story_count: z.number().int().nonnegative(),
  stories: z.array(fullRecordSchema)
});

export type ScrapeArtifact = z.infer<typeof scrapeArtifactSchema>;

export interface SaveOptions {
  source: string;
  directory?: string;
  filename?: string;
  now?: () => Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function safeSourceName(source: string): string {
  return source
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/[-\s]+/g, '_') || 'source';
}

export async function saveScrapeArtifact(stories: FullRecord[], options: SaveOptions): Promise<string> {
  const directory = options.directory ?? 'data';
  const now = (options.now ?? (() => new Date()))();
  const filename = options.filename ?? `${safeSourceName(options.source)}_news_${formatTimestamp(now)}.json`;

  await fs.mkdir(directory, { recursive: true });
  const target = path.join(directory, filename);

  const artifact: ScrapeArtifact = {
    source: options.source,
    scraped_at: now.toISOString(),
    story_count: stories.length,
    stories
  };

  await fs.writeFile(target, JSON.stringify(artifact, null, 2), 'utf-8');
  logger.info(`Data successfully saved to ${target}`);
  return target;
}

/** Returns null when the file is missing, unreadable or not an artifact. */
export async function loadScrapeArtifact(filePath: string): Promise<ScrapeArtifact | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.warn(`File ${filePath} not found or unreadable`, { error: error instanceof Error ? error.message : error });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logger.warn(`Error loading JSON file ${filePath}`, { error: error instanceof Error ? error.message : error });
    return null;
  }

  const result = scrapeArtifactSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`File ${filePath} is not a scrape artifact`, { issues: result.error.issues.length });
    return null;
  }
  return result.data;
}
