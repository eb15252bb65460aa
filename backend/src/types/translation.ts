export type Chunk = {
  id: string;
  positionKey: number;
  text: string;
  /** Chapter (or other section) the chunk belongs to, used when merging output. */
  group?: string;
  /** Chapter heading, shown to the translator. */
  title?: string;
  /** Text just before the chunk, shown for continuity and never translated. */
  context?: string;
};

export type ViolationKind = 'missing' | 'inconsistent' | 'wrong-sense';

export type ViolationSeverity = 'major' | 'minor';

export type SourceSpan = {
  start: number;
  end: number;
};

export type Violation = {
  termKey: string;
  kind: ViolationKind;
  severity: ViolationSeverity;
  expected: string;
  found: string | null;
  span: SourceSpan;
};

export type Verdict = 'accept' | 'refine';

export type Judgment = {
  verdict: Verdict;
  reasons: string[];
  requiredFixes: Violation[];
  fidelityScore: number;
  styleNotes: string[];
};

export type RecordStatus = 'pending' | 'in_progress' | 'done' | 'failed';

/** States of the per-chunk Translate -> Evaluate -> Refine machine. */
export type TearState =
  | 'pending'
  | 'translating'
  | 'evaluating'
  | 'refining'
  | 'accepted'
  | 'finalized'
  | 'failed';

export type ErrorKind = 'external' | 'schema' | 'validation' | 'unexpected';

export type RecordError = {
  kind: ErrorKind;
  message: string;
  rawPayload?: string;
};

export type IterationOutcome = {
  iteration: number;
  draft: string;
  backTranslation: string;
  fidelityScore: number;
  violations: Violation[];
};

export type TranslationRecord = {
  chunkId: string;
  positionKey: number;
  group?: string;
  source: string;
  draft: string | null;
  backTranslation: string | null;
  critique: Judgment | null;
  violations: Violation[];
  finalTranslation: string | null;
  iterationCount: number;
  status: RecordStatus;
  fidelityScore: number | null;
  degraded: boolean;
  iterations: IterationOutcome[];
  error?: RecordError;
  meta: {
    model: string;
    elapsedMs: number;
  };
};

export type LedgerEntry = {
  chunkId: string;
  state: TearState;
  timestamp: string;
  payload: TranslationRecord;
};

export type RunConfig = {
  maxIterations: number;
  fidelityThreshold: number;
  allowMinorViolations: boolean;
  concurrencyLimit: number;
  retryBudget: number;
  retryBaseDelayMs: number;
  styleReview: boolean;
};

export type RunReport = {
  runId: string;
  total: number;
  done: number;
  doneDegraded: number;
  failed: number;
  cancelled: number;
  skipped: number;
  degradedChunks: Array<{ chunkId: string; positionKey: number; violations: Violation[]; fidelityScore: number | null }>;
  failedChunks: Array<{ chunkId: string; positionKey: number; violations: Violation[]; error?: RecordError }>;
};
