import dotenv from 'dotenv';

dotenv.config();

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: numberFromEnv(process.env.PORT, 4000),
  logLevel: process.env.LOG_LEVEL ?? '',
  dataDir: process.env.DATA_DIR ?? './data',
  openAiApiKey: process.env.OPENAI_API_KEY ?? '',
  openAiModel: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
  // Any OpenAI-compatible endpoint (self-hosted or third-party gateways)
  openAiBaseUrl: process.env.OPENAI_BASE_URL ?? '',
  sourceLanguage: process.env.SOURCE_LANGUAGE ?? 'Chinese',
  targetLanguage: process.env.TARGET_LANGUAGE ?? 'English',
  defaultAIProvider: (process.env.DEFAULT_AI_PROVIDER ?? 'openai').toLowerCase(),
  tearMaxIterations: numberFromEnv(process.env.TEAR_MAX_ITERATIONS, 3),
  tearFidelityThreshold: numberFromEnv(process.env.TEAR_FIDELITY_THRESHOLD, 0.6),
  tearAllowMinorViolations: booleanFromEnv(process.env.TEAR_ALLOW_MINOR_VIOLATIONS, false),
  tearConcurrency: numberFromEnv(process.env.TEAR_CONCURRENCY, 4),
  tearStyleReview: booleanFromEnv(process.env.TEAR_STYLE_REVIEW, false),
  aiMaxRetries: numberFromEnv(process.env.AI_MAX_RETRIES, 3),
  aiRetryDelayMs: numberFromEnv(process.env.AI_RETRY_DELAY_MS, 300),
};
