import assert from 'node:assert/strict';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { chunk } from '../../ai/__tests__/fakes';
import { createPendingRecord } from '../../ai/tearOrchestrator';
import type { LedgerEntry, TearState } from '../../types/translation';
import { FileRunLedger, InMemoryRunLedger } from '../runLedger.service';

const entry = (chunkId: string, state: TearState): LedgerEntry => ({
  chunkId,
  state,
  timestamp: '2024-01-01T00:00:00.000Z',
  payload: createPendingRecord(chunk(chunkId, Number(chunkId.slice(1)), '门开了。')),
});

const tempLedger = async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'ledger-'));
  return FileRunLedger.forRun(dir, 'run-1');
};

test('names the ledger file after the run', async () => {
  const ledger = await tempLedger();
  assert.equal(path.basename(ledger.filePath), 'run-1.ledger.jsonl');
});

test('keeps every line intact under concurrent appends', async () => {
  const ledger = await tempLedger();
  const ids = Array.from({ length: 20 }, (_, index) => `c${index + 1}`);

  await Promise.all(ids.map((id) => ledger.append(entry(id, 'pending'))));

  const lines = (await readFile(ledger.filePath, 'utf8')).trim().split('\n');
  assert.equal(lines.length, 20);
  const replayed = await ledger.replay();
  assert.deepEqual([...replayed.keys()], ids);
});

test('replays the last entry of each chunk', async () => {
  const ledger = await tempLedger();
  await ledger.append(entry('c1', 'pending'));
  await ledger.append(entry('c2', 'pending'));
  await ledger.append(entry('c1', 'translating'));

  const replayed = await ledger.replay();

  assert.equal(replayed.get('c1')?.state, 'translating');
  assert.equal(replayed.get('c2')?.state, 'pending');
});

test('skips a torn last line', async () => {
  const ledger = await tempLedger();
  await ledger.append(entry('c1', 'pending'));
  await writeFile(ledger.filePath, '{"chunkId":"c2","sta', { flag: 'a' });

  const replayed = await ledger.replay();

  assert.deepEqual([...replayed.keys()], ['c1']);
});

test('starts a new line after a torn last line when appending again', async () => {
  const first = await tempLedger();
  await first.append(entry('c1', 'pending'));
  await writeFile(first.filePath, '{"chunkId":"c2","sta', { flag: 'a' });

  const resumed = new FileRunLedger(first.filePath);
  await resumed.append(entry('c3', 'pending'));
  await resumed.append(entry('c4', 'pending'));

  const replayed = await resumed.replay();
  assert.deepEqual([...replayed.keys()], ['c1', 'c3', 'c4']);
  const lines = (await readFile(first.filePath, 'utf8')).split('\n');
  assert.equal(lines[1], '{"chunkId":"c2","sta');
  assert.equal(lines.length, 5);
});

test('skips entries of the wrong shape', async () => {
  const ledger = await tempLedger();
  await writeFile(ledger.filePath, `${JSON.stringify({ chunkId: 'c9', state: 'dreaming' })}\n`, 'utf8');
  await ledger.append(entry('c1', 'pending'));

  const replayed = await ledger.replay();

  assert.deepEqual([...replayed.keys()], ['c1']);
});

test('replays nothing when the file does not exist', async () => {
  const ledger = await tempLedger();
  assert.equal((await ledger.replay()).size, 0);
});

test('copies entries in and out of the in-memory ledger', async () => {
  const ledger = new InMemoryRunLedger();
  const original = entry('c1', 'pending');
  await ledger.append(original);
  original.payload.draft = 'changed';

  const replayed = await ledger.replay();
  const last = replayed.get('c1');
  assert.equal(last?.payload.draft, null);

  if (last) last.payload.draft = 'changed again';
  assert.equal(ledger.entries[0].payload.draft, null);
});
