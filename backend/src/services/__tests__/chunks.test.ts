import assert from 'node:assert/strict';
import test from 'node:test';

import { chunk } from '../../ai/__tests__/fakes';
import { ValidationError } from '../../utils/errors';
import { attachPrecedingContext, parseChunksJsonl, parseGroupRange, selectChunks } from '../chunks.service';

test('reads snake_case and camelCase chunk lines', () => {
  const raw = [
    JSON.stringify({ id: 1, position_key: 1, text: '克莱恩·莫雷蒂推开了门。', chapter_id: 7 }),
    '',
    JSON.stringify({ id: 'c2', positionKey: 2, text: '门开了。' }),
  ].join('\n');

  assert.deepEqual(parseChunksJsonl(raw), [
    { id: '1', positionKey: 1, text: '克莱恩·莫雷蒂推开了门。', group: '7' },
    { id: 'c2', positionKey: 2, text: '门开了。' },
  ]);
});

test('rejects a line without a position', () => {
  assert.throws(
    () => parseChunksJsonl(JSON.stringify({ id: 'c1', text: '门开了。' }), 'chunks.jsonl'),
    (error: unknown) => error instanceof ValidationError && error.message === 'chunks.jsonl:1 is not a valid chunk',
  );
});

test('rejects a repeated chunk id', () => {
  const line = JSON.stringify({ id: 'c1', positionKey: 1, text: '门开了。' });

  assert.throws(
    () => parseChunksJsonl(`${line}\n${line}`),
    (error: unknown) => error instanceof ValidationError && error.message === 'input:2 repeats chunk id c1',
  );
});

test('rejects a line that is not JSON', () => {
  assert.throws(() => parseChunksJsonl('{"id": "c1",'), ValidationError);
});

test('rejects a chunk without text', () => {
  assert.throws(() => parseChunksJsonl(JSON.stringify({ id: 'c1', positionKey: 1, text: '' })), ValidationError);
});

test('reads chapter titles and preceding context in either layout', () => {
  const raw = [
    JSON.stringify({
      id: 'c1',
      position_key: 1,
      text: '门开了。',
      context: { chapter_title: '第一章 绯红', prev_chunk_tail: '夜很深。' },
    }),
    JSON.stringify({ id: 'c2', positionKey: 2, text: '窗开了。', title: 'Crimson', context: '门开了。' }),
  ].join('\n');

  assert.deepEqual(parseChunksJsonl(raw), [
    { id: 'c1', positionKey: 1, text: '门开了。', title: '第一章 绯红', context: '夜很深。' },
    { id: 'c2', positionKey: 2, text: '窗开了。', title: 'Crimson', context: '门开了。' },
  ]);
});

test('gives each chunk the tail of the one before it in the same group', () => {
  const chunks = [
    chunk('c3', 3, '灯亮了。', '2'),
    chunk('c1', 1, '克莱恩·莫雷蒂推开了门。', '1'),
    chunk('c2', 2, '门开了。', '1'),
  ];

  const withContext = attachPrecedingContext(chunks, 4);

  assert.deepEqual(
    withContext.map((item) => [item.id, item.context]),
    [
      ['c3', undefined],
      ['c1', undefined],
      ['c2', '开了门。'],
    ],
  );
});

test('reads a single group or a range of groups', () => {
  assert.deepEqual(parseGroupRange('3'), { from: 3, to: 3 });
  assert.deepEqual(parseGroupRange('1-2'), { from: 1, to: 2 });
  assert.throws(() => parseGroupRange('2-1'), ValidationError);
  assert.throws(() => parseGroupRange('one'), ValidationError);
});

const book = [
  chunk('a1', 1, '一。', 'ch1'),
  chunk('a2', 2, '二。', 'ch1'),
  chunk('a3', 3, '三。', 'ch1'),
  chunk('b1', 4, '四。', 'ch2'),
  chunk('b2', 5, '五。', 'ch2'),
  chunk('c1', 6, '六。', 'ch3'),
];

test('selects chunks by group range and per-group limits', () => {
  const ids = (selected: ReturnType<typeof selectChunks>) => selected.map((item) => item.id);

  assert.deepEqual(ids(selectChunks(book, { groups: { from: 2, to: 3 } })), ['b1', 'b2', 'c1']);
  assert.deepEqual(ids(selectChunks(book, { maxGroups: 2, maxChunksPerGroup: 1 })), ['a1', 'b1']);
  assert.deepEqual(ids(selectChunks(book, { groups: { from: 1, to: 2 }, maxChunksPerGroup: 2 })), ['a1', 'a2', 'b1', 'b2']);
  assert.deepEqual(ids(selectChunks(book, {})), ['a1', 'a2', 'a3', 'b1', 'b2', 'c1']);
});
