import assert from 'node:assert/strict';
import test from 'node:test';

import { ValidationError } from '../errors';
import { findNearMiss, similarityRatio } from '../fuzzy';
import { defaultRunConfig, resolveRunConfig } from '../runConfig';
import { containment, contentUnits, contextSignature, findSurface, jaccard, normalizeKey, toSearchable } from '../tokenize';

test('splits CJK text into characters and other scripts into words', () => {
  assert.deepEqual(contentUnits('Klein推开 the door, 2 times'), ['klein', '推', '开', 'the', 'door', '2', 'times']);
});

test('normalizes keys to NFKC with collapsed whitespace', () => {
  assert.equal(normalizeKey('  Ｔｉｎｇｅｎ   City '), 'Tingen City');
});

test('finds a surface form in width and spacing variants and reports the raw span', () => {
  const source = toSearchable('Ｔｈｅ  Tingen   City');

  assert.equal(source.folded, 'the tingen city');
  assert.deepEqual(findSurface(source, 'Tingen City'), { start: 5, end: 18 });
  assert.deepEqual(findSurface(toSearchable('Cafe\u0301 Noir'), 'café'), { start: 0, end: 5 });
  assert.equal(findSurface(source, 'Backlund'), null);
});

test('builds context signatures from keywords', () => {
  assert.deepEqual(contextSignature('。，'), []);
  assert.deepEqual(contextSignature('tarot tarot card the'), ['card', 'tarot']);
});

test('measures overlap between signatures', () => {
  assert.equal(jaccard(['a', 'b'], ['b', 'c']), 1 / 3);
  assert.equal(jaccard([], ['a']), 0);
  assert.equal(containment(['a', 'b'], new Set(['a'])), 0.5);
});

test('rates near-identical strings by edit distance', () => {
  assert.equal(similarityRatio('Klein Moretti', 'klein  moretti'), 1);
  assert.equal(similarityRatio('Klein Moretti', 'klein moreti'), 1 - 1 / 13);
  assert.equal(similarityRatio('', 'x'), 0);
});

test('finds a misspelled rendering but not an exact one', () => {
  assert.deepEqual(findNearMiss('Klein Moreti pushed the door.', 'Klein Moretti'), {
    text: 'klein moreti',
    ratio: 1 - 1 / 13,
  });
  assert.equal(findNearMiss('Klein Moretti pushed the door.', 'Klein Moretti'), null);
});

test('overlays run settings on the environment defaults', () => {
  const config = resolveRunConfig({ maxIterations: 5, fidelityThreshold: undefined });

  assert.equal(config.maxIterations, 5);
  assert.equal(config.fidelityThreshold, defaultRunConfig().fidelityThreshold);
  assert.throws(() => resolveRunConfig({ maxIterations: 0 }), ValidationError);
  assert.throws(() => resolveRunConfig({ fidelityThreshold: 1.5 }), ValidationError);
});
