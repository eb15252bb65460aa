import assert from 'node:assert/strict';
import { mkdtemp, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { KLEIN, reviewedKnowledgeBase } from '../../ai/__tests__/fakes';
import type { ExtractedTerm, TermEntry } from '../../types/glossary';
import { ValidationError } from '../../utils/errors';
import { KnowledgeBase, suggestFinal } from '../knowledgeBase.service';

const extracted = (overrides: Partial<ExtractedTerm> & Pick<ExtractedTerm, 'key'>): ExtractedTerm => ({
  type: 'domain-term',
  aliases: [],
  candidates: [],
  evidence: '',
  chunkId: 'c1',
  ...overrides,
});

test('keeps an approved rendering when new candidates are merged', () => {
  const kb = reviewedKnowledgeBase([KLEIN]);

  const report = kb.merge([
    extracted({
      key: '克莱恩·莫雷蒂',
      type: 'person',
      candidates: [{ rendering: 'Kelaien', score: 0.9, source: 'extraction' }],
    }),
  ]);

  assert.deepEqual(report.keptFinal, ['克莱恩·莫雷蒂']);
  assert.equal(kb.get('克莱恩·莫雷蒂')?.final, 'Klein Moretti');
  assert.deepEqual(
    kb.get('克莱恩·莫雷蒂')?.candidates.map((candidate) => candidate.rendering),
    ['Cai Lian', 'Klein Moretti', 'Kelaien'],
  );
});

test('adds new keys without an approved rendering and leaves them out of snapshots', () => {
  const kb = reviewedKnowledgeBase([KLEIN]);

  const report = kb.merge([extracted({ key: '廷根', type: 'location', evidence: '廷根市' })]);

  assert.deepEqual(report.added, ['廷根']);
  assert.equal(kb.get('廷根')?.final, '');
  assert.equal(kb.snapshot().get('廷根'), undefined);
  assert.equal(kb.snapshot().size, 1);
});

test('isolates a snapshot from later reviews', () => {
  const kb = reviewedKnowledgeBase([KLEIN]);
  const snapshot = kb.snapshot();

  kb.applyReview([
    { term: '克莱恩·莫雷蒂', type: 'person', candidates: [], evidence: [], suggestedFinal: '', final: 'Klein', senses: [] },
  ]);

  assert.equal(snapshot.get('克莱恩·莫雷蒂')?.final, 'Klein Moretti');
  assert.equal(snapshot.version, 2);
  assert.equal(kb.version, 3);
  assert.equal(kb.snapshot().get('克莱恩·莫雷蒂')?.final, 'Klein');
  assert.ok(Object.isFrozen(snapshot.get('克莱恩·莫雷蒂')));
});

test('bumps the version on every review', () => {
  const kb = new KnowledgeBase();
  const report = kb.applyReview([]);

  assert.equal(report.version, 2);
  assert.equal(kb.version, 2);
});

test('opens a new sense when a domain term shows up in an unrelated context', () => {
  const kb = new KnowledgeBase();
  kb.merge([
    extracted({
      key: '星',
      evidence: '夜空中的星星很亮',
      candidates: [{ rendering: 'star', score: 0.8, source: 'extraction' }],
    }),
  ]);

  const report = kb.merge([
    extracted({
      key: '星',
      evidence: '他抽出一张塔罗牌',
      candidates: [{ rendering: 'Star card', score: 0.7, source: 'extraction' }],
    }),
  ]);

  assert.deepEqual(report.split, ['星']);
  const senses = kb.get('星')?.senses ?? [];
  assert.equal(senses.length, 1);
  assert.equal(senses[0].id, '星#1');
  assert.equal(senses[0].final, '');
  assert.equal(senses[0].suggested, 'Star card');
  assert.deepEqual(senses[0].evidence, ['他抽出一张塔罗牌']);
});

test('never splits a named entity into senses', () => {
  const kb = new KnowledgeBase();
  kb.merge([extracted({ key: '阿蒙', type: 'deity', evidence: '夜空中的星星很亮' })]);

  const report = kb.merge([extracted({ key: '阿蒙', type: 'deity', evidence: '他抽出一张塔罗牌' })]);

  assert.deepEqual(report.split, []);
  assert.deepEqual(report.merged, ['阿蒙']);
  assert.deepEqual(kb.get('阿蒙')?.senses, []);
});

test('resolves aliases to their entry', () => {
  const kb = new KnowledgeBase();
  kb.merge([extracted({ key: '克莱恩·莫雷蒂', type: 'person', aliases: ['克莱恩'] })]);

  assert.equal(kb.get('克莱恩')?.key, '克莱恩·莫雷蒂');

  const report = kb.merge([extracted({ key: '克莱恩', type: 'person' })]);
  assert.deepEqual(report.merged, ['克莱恩·莫雷蒂']);
  assert.equal(kb.size, 1);
});

test('suggests the rendering with the best aggregate score', () => {
  const entry: TermEntry = {
    key: '魔药',
    type: 'domain-term',
    final: '',
    aliases: [],
    candidates: [
      { rendering: 'potion', score: 0.5, source: 'extraction' },
      { rendering: 'potion', score: 0.5, source: 'extraction' },
      { rendering: 'potion', score: 0.5, source: 'extraction' },
      { rendering: 'elixir', score: 0.9, source: 'extraction' },
    ],
    evidence: [],
    senses: [],
  };

  assert.equal(suggestFinal(entry), 'potion');
  assert.equal(suggestFinal({ ...entry, candidates: [] }), '');
});

test('saves versioned files and loads the latest one', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'kb-'));
  const kb = reviewedKnowledgeBase([KLEIN]);
  await kb.save(dir);
  kb.applyReview([
    { term: '廷根', type: 'location', candidates: [], evidence: [], suggestedFinal: '', final: 'Tingen', senses: [] },
  ]);
  await kb.save(dir);

  const loaded = await KnowledgeBase.loadLatest(dir);

  assert.deepEqual((await readdir(dir)).sort(), ['glossary_v2.json', 'glossary_v3.json']);
  assert.equal(loaded.version, 3);
  assert.equal(loaded.get('廷根')?.final, 'Tingen');
  assert.equal(loaded.get('克莱恩·莫雷蒂')?.final, 'Klein Moretti');
});

test('starts empty when the directory does not exist', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'kb-'));
  const kb = await KnowledgeBase.loadLatest(path.join(dir, 'missing'));

  assert.equal(kb.size, 0);
  assert.equal(kb.version, 1);
});

test('rejects a malformed knowledge base file', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'kb-'));
  await writeFile(path.join(dir, 'glossary_v4.json'), JSON.stringify({ version: 4, entries: [{ key: '' }] }), 'utf8');

  await assert.rejects(KnowledgeBase.loadLatest(dir), ValidationError);
});
