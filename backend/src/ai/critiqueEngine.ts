import type { Judgment, Violation } from '../types/translation';

export type CritiquePolicy = {
  fidelityThreshold: number;
  allowMinorViolations: boolean;
};

const describeViolation = (violation: Violation): string => {
  switch (violation.kind) {
    case 'missing':
      return `Term "${violation.termKey}" must be rendered as "${violation.expected}" but the rendering is missing.`;
    case 'wrong-sense':
      return `Term "${violation.termKey}" is rendered as "${violation.found ?? ''}", which is a different sense; use "${violation.expected}" here.`;
    case 'inconsistent':
      return `Term "${violation.termKey}" is rendered as "${violation.found ?? ''}"; the approved rendering is "${violation.expected}".`;
  }
};

/**
 * Accept when fidelity reaches the threshold and there is no violation left
 * that policy treats as blocking. Style notes are carried along but never
 * decide the verdict.
 */
export const critique = (
  violations: Violation[],
  fidelity: number,
  styleNotes: string[],
  policy: CritiquePolicy,
): Judgment => {
  const blocking = violations.filter((violation) => violation.severity === 'major' || !policy.allowMinorViolations);
  const fidelityOk = fidelity >= policy.fidelityThreshold;

  const reasons = violations.map(describeViolation);
  if (!fidelityOk) {
    reasons.push(
      `Back-translation fidelity ${fidelity.toFixed(2)} is below ${policy.fidelityThreshold.toFixed(2)}; restore omitted or distorted content.`,
    );
  }
  reasons.push(...styleNotes);

  return {
    verdict: fidelityOk && blocking.length === 0 ? 'accept' : 'refine',
    reasons,
    requiredFixes: [...violations],
    fidelityScore: fidelity,
    styleNotes: [...styleNotes],
  };
};
