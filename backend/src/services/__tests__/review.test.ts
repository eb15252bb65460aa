import assert from 'node:assert/strict';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { KLEIN, reviewedKnowledgeBase } from '../../ai/__tests__/fakes';
import type { ReviewRow } from '../../types/glossary';
import { ValidationError } from '../../utils/errors';
import {
  buildReviewTable,
  parseCandidates,
  parseReviewRows,
  parseSenses,
  readReviewFile,
  reviewTableFromWorkbook,
  reviewTableToWorkbook,
  writeReviewFile,
} from '../review.service';

const rows: ReviewRow[] = [
  {
    term: '星',
    type: 'domain-term',
    candidates: [
      { rendering: 'star', score: 0.9 },
      { rendering: 'Star card', score: 0.4 },
    ],
    evidence: ['夜空中的星星很亮', '他抽出一张塔罗牌'],
    suggestedFinal: 'star',
    final: 'star',
    senses: [{ id: '星#1', final: 'Star Tarot', gloss: '塔罗牌 占卜' }],
  },
  {
    term: '克莱恩·莫雷蒂',
    type: 'person',
    candidates: [{ rendering: 'Klein Moretti', score: 1 }],
    evidence: [],
    suggestedFinal: 'Klein Moretti',
    final: '',
    senses: [],
  },
];

test('reads candidate cells with and without scores', () => {
  assert.deepEqual(parseCandidates('Tingen (0.90) | Tingen City | (0.3)'), [
    { rendering: 'Tingen', score: 0.9 },
    { rendering: 'Tingen City', score: 0.5 },
  ]);
});

test('reads sense cells in all three layouts', () => {
  assert.deepEqual(parseSenses('星#1 | Star Tarot | 塔罗牌\nStar card | tarot\nstarlight'), [
    { id: '星#1', final: 'Star Tarot', gloss: '塔罗牌' },
    { final: 'Star card', gloss: 'tarot' },
    { final: 'starlight' },
  ]);
});

test('offers the best-scored rendering first', () => {
  const [row] = buildReviewTable(reviewedKnowledgeBase([KLEIN]));

  assert.deepEqual(
    row.candidates.map((candidate) => candidate.rendering),
    ['Klein Moretti', 'Cai Lian'],
  );
  assert.equal(row.suggestedFinal, 'Klein Moretti');
  assert.equal(row.final, 'Klein Moretti');
});

test('reads back a review workbook it wrote', () => {
  assert.deepEqual(reviewTableFromWorkbook(reviewTableToWorkbook(rows)), rows);
});

test('writes and reads a JSON review file', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'review-'));
  const filePath = path.join(dir, 'review.json');

  await writeReviewFile(rows, filePath);

  assert.deepEqual(await readReviewFile(filePath), rows);
});

test('maps loose term types onto the known ones', () => {
  const [row] = parseReviewRows([{ term: '廷根', type: 'Place', final: 'Tingen' }]);

  assert.equal(row.type, 'location');
  assert.equal(row.final, 'Tingen');
  assert.deepEqual(row.candidates, []);
});

test('rejects an unknown term type', () => {
  assert.throws(() => parseReviewRows([{ term: '廷根', type: 'weather' }]), ValidationError);
});
