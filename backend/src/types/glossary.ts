/**
 * Term categories recognised by the knowledge base.
 *
 * Everything except 'domain-term' is a named entity and must keep a single
 * rendering across the whole document.
 */
export const TERM_TYPES = [
  'person',
  'location',
  'organization',
  'deity',
  'language',
  'identity-title',
  'domain-term',
] as const;

export type TermType = (typeof TERM_TYPES)[number];

export const isNamedEntity = (type: TermType): boolean => type !== 'domain-term';

const TYPE_ALIASES: Record<string, TermType> = {
  per: 'person',
  character: 'person',
  loc: 'location',
  place: 'location',
  org: 'organization',
  organisation: 'organization',
  god: 'deity',
  lang: 'language',
  title: 'identity-title',
  identity: 'identity-title',
  term: 'domain-term',
  concept: 'domain-term',
};

/**
 * Maps model output such as "NE:person", "ORG" or "Identity Title" onto the
 * enumeration. Returns null for anything unrecognised.
 */
export const normalizeTermType = (raw: string): TermType | null => {
  const cleaned = raw
    .trim()
    .toLowerCase()
    .replace(/^ne:/, '')
    .replace(/[\s_]+/g, '-');
  const known = TERM_TYPES.find((type) => type === cleaned);
  return known ?? TYPE_ALIASES[cleaned] ?? null;
};

export type CandidateSource = 'extraction' | 'context' | 'review';

export type TermCandidate = {
  rendering: string;
  score: number;
  source: CandidateSource;
  chunkId?: string;
};

export type TermSense = {
  id: string;
  final: string;
  gloss?: string;
  /** Rendering proposed at extraction time, shown to the reviewer. */
  suggested?: string;
  evidence: string[];
  contextSignature: string[];
};

export type TermEntry = {
  key: string;
  type: TermType;
  final: string;
  aliases: string[];
  candidates: TermCandidate[];
  evidence: string[];
  senses: TermSense[];
};

/** What the extractor proposes for one key in one chunk. `final` is never set here. */
export type ExtractedTerm = {
  key: string;
  type: TermType;
  aliases: string[];
  candidates: TermCandidate[];
  evidence: string;
  chunkId: string;
};

export type KnowledgeBaseData = {
  version: number;
  worldSummary?: string;
  entries: TermEntry[];
};

export type ReviewCandidate = {
  rendering: string;
  score: number;
};

export type ReviewSense = {
  id?: string;
  final: string;
  suggested?: string;
  gloss?: string;
};

/** One row of the human-review table. */
export type ReviewRow = {
  term: string;
  type: TermType;
  candidates: ReviewCandidate[];
  evidence: string[];
  suggestedFinal: string;
  final: string;
  senses: ReviewSense[];
};
