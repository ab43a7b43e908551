/**
 * Test doubles shared across suites: an in-process fetcher and page builders
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { DiscoveryRecord } from '../types/adapter';
import { TransportError } from '../types/errors';
import { Fetcher } from '../scraper/tools/fetcher';

export type FakeBody = string | Error | (() => Readable);

function notFound(url: string): TransportError {
  return new TransportError(url, 'HTTP 404: Not Found', { status: 404 });
}

/** Serves canned pages and media; unknown URLs fail like a 404. */
export class FakeFetcher implements Fetcher {
  readonly textCalls: string[] = [];
  readonly streamCalls: string[] = [];

  constructor(
    private readonly pages: Record<string, string | Error> = {},
    private readonly media: Record<string, FakeBody> = {}
  ) {}

  async fetchText(url: string): Promise<string> {
    this.textCalls.push(url);
    const page = this.pages[url];
    if (page === undefined) throw notFound(url);
    if (page instanceof Error) throw page;
    return page;
  }

  async fetchStream(url: string): Promise<Readable> {
    this.streamCalls.push(url);
    const body = this.media[url];
    if (body === undefined) throw notFound(url);
    if (body instanceof Error) throw body;
    if (typeof body === 'function') return body();
    return Readable.from([Buffer.from(body)]);
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'newsroom-scraper-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function jsonScript(payload: unknown): string {
  return `<script type="application/json">${JSON.stringify(payload)}</script>`;
}

export function htmlPage(body: string): string {
  return `<!DOCTYPE html><html><head><title>Test</title></head><body>${body}</body></html>`;
}

export function discoveryRecord(overrides: Partial<DiscoveryRecord> = {}): DiscoveryRecord {
  return {
    slug: 'exam-results',
    headline: 'Exam results published',
    url: 'https://www.prothomalo.com/exam-results',
    last_published_at: '1718000000000',
    hero_image_url: null,
    scraped_at: '2024-06-10T08:00:00.000Z',
    ...overrides
  };
}
