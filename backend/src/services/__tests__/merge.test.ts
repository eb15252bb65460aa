import assert from 'node:assert/strict';
import test from 'node:test';

import { chunk } from '../../ai/__tests__/fakes';
import { createPendingRecord } from '../../ai/tearOrchestrator';
import type { TranslationRecord } from '../../types/translation';
import { mergeRecords } from '../merge.service';

const done = (id: string, position: number, text: string, group?: string): TranslationRecord => ({
  ...createPendingRecord(chunk(id, position, '原文', group)),
  status: 'done',
  finalTranslation: text,
});

test('restores document order whatever order chunks finished in', () => {
  const merged = mergeRecords([done('c3', 3, 'Three.'), done('c1', 1, 'One.'), done('c2', 2, 'Two.')]);

  assert.deepEqual(merged.order, ['c1', 'c2', 'c3']);
  assert.equal(merged.text, 'One.\nTwo.\nThree.');
});

test('separates groups with a blank line', () => {
  const merged = mergeRecords([
    done('c3', 3, 'Chapter two begins.', 'ch2'),
    done('c1', 1, 'Chapter one begins.', 'ch1'),
    done('c2', 2, 'Chapter one ends.', 'ch1'),
  ]);

  assert.deepEqual(
    merged.groups.map((group) => [group.group, group.chunkIds]),
    [
      ['ch1', ['c1', 'c2']],
      ['ch2', ['c3']],
    ],
  );
  assert.equal(merged.text, 'Chapter one begins.\nChapter one ends.\n\nChapter two begins.');
});

test('leaves an empty line for a failed chunk and lists it', () => {
  const failed: TranslationRecord = {
    ...createPendingRecord(chunk('c2', 2, '原文')),
    status: 'failed',
    draft: 'Half a draft.',
    error: { kind: 'external', message: 'timeout' },
  };
  const degraded: TranslationRecord = { ...done('c3', 3, 'Best effort.'), degraded: true };

  const merged = mergeRecords([done('c1', 1, 'One.'), failed, degraded]);

  assert.equal(merged.text, 'One.\n\nBest effort.');
  assert.deepEqual(merged.failedChunks, ['c2']);
  assert.deepEqual(merged.degradedChunks, ['c3']);
});

test('orders chunks that share a position by id', () => {
  const merged = mergeRecords([done('b', 1, 'B.'), done('a', 1, 'A.')]);
  assert.deepEqual(merged.order, ['a', 'b']);
});
