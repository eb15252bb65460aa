import type { TranslationRecord } from '../types/translation';

export type MergedGroup = {
  group: string | null;
  chunkIds: string[];
  text: string;
};

export type MergedDocument = {
  /** Chunk ids in output order. */
  order: string[];
  groups: MergedGroup[];
  text: string;
  failedChunks: string[];
  degradedChunks: string[];
};

/**
 * Puts records back in document order, whatever order they finished in.
 * Chunks of one group (chapter) are joined by newlines, groups by a blank
 * line. A failed chunk leaves an empty line in its place.
 */
export const mergeRecords = (records: TranslationRecord[]): MergedDocument => {
  const ordered = [...records].sort((a, b) => a.positionKey - b.positionKey || a.chunkId.localeCompare(b.chunkId));

  const groups: Array<{ group: string | null; chunkIds: string[]; parts: string[] }> = [];
  const byGroup = new Map<string, (typeof groups)[number]>();
  for (const record of ordered) {
    const key = record.group ?? '';
    let bucket = byGroup.get(key);
    if (!bucket) {
      bucket = { group: record.group ?? null, chunkIds: [], parts: [] };
      byGroup.set(key, bucket);
      groups.push(bucket);
    }
    bucket.chunkIds.push(record.chunkId);
    bucket.parts.push(record.status === 'done' ? record.finalTranslation ?? '' : '');
  }

  const merged = groups.map(({ group, chunkIds, parts }) => ({ group, chunkIds, text: parts.join('\n') }));
  return {
    order: ordered.map((record) => record.chunkId),
    groups: merged,
    text: merged.map((group) => group.text).join('\n\n'),
    failedChunks: ordered.filter((record) => record.status !== 'done').map((record) => record.chunkId),
    degradedChunks: ordered.filter((record) => record.status === 'done' && record.degraded).map((record) => record.chunkId),
  };
};
