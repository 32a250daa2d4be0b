import dotenv from 'dotenv';
dotenv.config();

export type SignatureMode = 'header' | 'body' | 'both';

function num(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function signatureMode(raw: string | undefined): SignatureMode {
  const v = (raw || 'header').toLowerCase();
  return v === 'body' || v === 'both' ? v : 'header';
}

const DEFAULT_VISION_PROMPT = `You are an expert automotive damage assessor. Analyze the provided car images and generate a detailed description of any visible damage, condition issues, or notable features. Focus on:
- Exterior damage (dents, scratches, rust, paint issues)
- Interior condition (wear, tears, stains)
- Mechanical visible issues
- Overall condition assessment
- Market-relevant details for potential buyers

Provide your response in clear, professional language suitable for a vehicle listing. Be specific about locations and severity of any damage found.`;

export const config = {
  mongoUri: process.env.MONGO_URI || 'mongodb://localhost:27017/lotbatch?replicaSet=rs0',
  mongoDbName: process.env.MONGO_DB || process.env.MONGO_DB_NAME || 'lotbatch',
  port: num('PORT', 4000),
  nodeEnv: process.env.NODE_ENV || 'development',
  // HMAC secret shared with clients (inbound requests and outbound webhooks)
  sharedKey: process.env.SHARED_KEY || 'change-me',
  // OpenAI batch provider
  openaiApiKey: process.env.OPENAI_API_KEY,
  openaiTimeoutMs: num('OPENAI_TIMEOUT_MS', 60_000),
  visionModel: process.env.VISION_MODEL || 'o4-mini',
  visionReasoningEffort: process.env.VISION_REASONING_EFFORT || 'medium',
  translationModel: process.env.TRANSLATION_MODEL || 'gpt-4.1-mini',
  maxOutputTokens: num('MAX_OUTPUT_TOKENS', 2048),
  visionSystemPrompt: process.env.VISION_SYSTEM_PROMPT || DEFAULT_VISION_PROMPT,
  providerMaxRetries: num('PROVIDER_MAX_RETRIES', 2),
  providerInitialBackoffMs: num('PROVIDER_INITIAL_BACKOFF_MS', 400),
  providerBackoffFactor: num('PROVIDER_BACKOFF_FACTOR', 2),
  // Job limits
  maxLots: num('MAX_LOTS', 50_000),
  maxRequestsPerBatch: num('MAX_REQUESTS_PER_BATCH', 50_000),
  maxBatchFileBytes: num('MAX_BATCH_FILE_BYTES', 200_000_000),
  jobCreationBudgetMs: num('JOB_CREATION_BUDGET_MS', 15_000),
  // Scheduler
  schedulerCron: process.env.SCHEDULER_CRON || '*/30 * * * * *',
  retentionDays: num('RETENTION_DAYS', 7),
  cleanupIntervalMinutes: num('CLEANUP_INTERVAL_MINUTES', 60),
  maxRecoveryAttempts: num('MAX_RECOVERY_ATTEMPTS', 5),
  // Webhook delivery
  webhookMaxAttempts: num('WEBHOOK_MAX_ATTEMPTS', 5),
  webhookBaseDelaySeconds: num('WEBHOOK_BASE_DELAY_SECONDS', 30),
  webhookMaxDelaySeconds: num('WEBHOOK_MAX_DELAY_SECONDS', 3600),
  webhookTimeoutMs: num('WEBHOOK_TIMEOUT_MS', 10_000),
  webhookSignatureMode: signatureMode(process.env.WEBHOOK_SIGNATURE_MODE),
  webhookUserAgent: process.env.WEBHOOK_USER_AGENT || 'lotbatch-webhook/1.0',
};

export type AppConfig = typeof config;
