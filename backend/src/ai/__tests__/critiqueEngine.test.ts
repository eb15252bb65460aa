import assert from 'node:assert/strict';
import test from 'node:test';

import type { Violation } from '../../types/translation';
import { critique } from '../critiqueEngine';

const policy = { fidelityThreshold: 0.6, allowMinorViolations: false };

const inconsistent: Violation = {
  termKey: '克莱恩·莫雷蒂',
  kind: 'inconsistent',
  severity: 'major',
  expected: 'Klein Moretti',
  found: 'Cai Lian',
  span: { start: 0, end: 7 },
};

const nearMiss: Violation = { ...inconsistent, severity: 'minor', found: 'klein moreti' };

test('accepts a faithful draft without violations', () => {
  assert.deepEqual(critique([], 0.9, [], policy), {
    verdict: 'accept',
    reasons: [],
    requiredFixes: [],
    fidelityScore: 0.9,
    styleNotes: [],
  });
});

test('asks for refinement on a violation and carries it as a required fix', () => {
  const judgment = critique([inconsistent], 1, [], policy);

  assert.equal(judgment.verdict, 'refine');
  assert.deepEqual(judgment.requiredFixes, [inconsistent]);
  assert.deepEqual(judgment.reasons, [
    'Term "克莱恩·莫雷蒂" is rendered as "Cai Lian"; the approved rendering is "Klein Moretti".',
  ]);
});

test('asks for refinement when fidelity falls short', () => {
  const judgment = critique([], 0.5, [], policy);

  assert.equal(judgment.verdict, 'refine');
  assert.deepEqual(judgment.reasons, [
    'Back-translation fidelity 0.50 is below 0.60; restore omitted or distorted content.',
  ]);
});

test('accepts at exactly the threshold', () => {
  assert.equal(critique([], 0.6, [], policy).verdict, 'accept');
});

test('lets minor violations through only when configured', () => {
  assert.equal(critique([nearMiss], 1, [], policy).verdict, 'refine');

  const lenient = critique([nearMiss], 1, [], { ...policy, allowMinorViolations: true });
  assert.equal(lenient.verdict, 'accept');
  assert.deepEqual(lenient.requiredFixes, [nearMiss]);
});

test('keeps major violations blocking under the lenient policy', () => {
  assert.equal(critique([inconsistent, nearMiss], 1, [], { ...policy, allowMinorViolations: true }).verdict, 'refine');
});

test('passes style notes along without changing the verdict', () => {
  const judgment = critique([], 0.9, ['Tighten the second sentence.'], policy);

  assert.equal(judgment.verdict, 'accept');
  assert.deepEqual(judgment.reasons, ['Tighten the second sentence.']);
  assert.deepEqual(judgment.styleNotes, ['Tighten the second sentence.']);
});
