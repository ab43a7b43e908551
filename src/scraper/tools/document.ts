/**
 * Document helpers: HTML loading, embedded JSON decoding and raw tree access
 */

import * as cheerio from 'cheerio';
import { DecodeError } from '../../types/errors';
import { RawMap, RawNode } from '../../types/adapter';
import { logger } from '../../utils/logger';

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

export function isRawMap(node: RawNode | undefined): node is RawMap {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Checks that a decoded value only contains JSON shapes. Walks with an
 * explicit stack so payload depth is not limited by the call stack.
 */
export function isRawNode(value: unknown): value is RawNode {
  const stack: unknown[] = [value];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === null || typeof current === 'string' || typeof current === 'boolean') {
      continue;
    }
    if (typeof current === 'number') {
      if (!Number.isFinite(current)) return false;
      continue;
    }
    if (Array.isArray(current)) {
      for (const item of current) stack.push(item);
      continue;
    }
    if (typeof current === 'object' && current !== null) {
      for (const item of Object.values(current)) stack.push(item);
      continue;
    }
    return false;
  }
  return true;
}

export function decodeJson(text: string): RawNode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Malformed JSON: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
  if (!isRawNode(parsed)) {
    throw new DecodeError('Decoded value is not a JSON tree');
  }
  return parsed;
}

/**
 * Decode every `<script type="application/json">` block. A block that fails
 * to decode is skipped; the others are still returned.
 */
export function parseJsonScripts($: cheerio.CheerioAPI, context = 'page'): RawNode[] {
  const payloads: RawNode[] = [];

  $('script[type="application/json"]').each((index, element) => {
    const text = $(element).text();
    if (!text.trim()) return;

    try {
      payloads.push(decodeJson(text));
    } catch (error) {
      if (error instanceof DecodeError) {
        logger.debug(`Skipping script #${index + 1} on ${context}: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  return payloads;
}

/** Follow a key path through nested mappings. */
export function getPath(node: RawNode, path: string[]): RawNode | undefined {
  let current: RawNode | undefined = node;
  for (const key of path) {
    if (!isRawMap(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function readString(node: RawMap, key: string): string | null {
  const value = node[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/** Remove markup from an HTML fragment and decode entities. */
export function stripTags(fragment: string): string {
  return cheerio.load(fragment, null, false).text();
}
