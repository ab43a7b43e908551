import { DiscoveryRecord } from '../types/adapter';

/**
 * Keep the first record for each slug, preserving order. Later duplicates
 * are dropped whole, even when they carry fields the first one lacks.
 */
export function dedupeBySlug(records: DiscoveryRecord[]): DiscoveryRecord[] {
  const unique: DiscoveryRecord[] = [];
  const seenSlugs = new Set<string>();

  for (const record of records) {
    if (seenSlugs.has(record.slug)) continue;
    seenSlugs.add(record.slug);
    unique.push(record);
  }

  return unique;
}
