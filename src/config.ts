import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'boolean' ? v : !['0', 'false', 'no', 'off'].includes(v.trim().toLowerCase())));

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
  OPENAI_API_KEY: z.string().optional().transform(v => (v && v.trim() ? v.trim() : undefined)),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  APPROVAL_MODE: z.enum(['auto', 'manual']).default('auto'),
  MAX_STEPS: positiveInt.default(5),
  PLANNER_TIMEOUT_MS: positiveInt.default(20_000),
  PLANNER_CONTEXT_MESSAGES: positiveInt.default(10),
  HISTORY_COMPACT_THRESHOLD: positiveInt.default(40),
  HISTORY_KEEP_RECENT: positiveInt.default(12),
  SEARCH_URL: z.string().url().default('http://localhost:9200'),
  SEARCH_INDEX: z.string().min(1).default('alerts-enriched'),
  SEARCH_TIMEOUT_MS: positiveInt.default(10_000),
  SEARCH_MAX_RESULTS: positiveInt.default(50),
  SEARCH_ALLOW_PARTIAL: flag.default(true),
  FETCH_TIMEOUT_MS: positiveInt.default(15_000),
  FETCH_MAX_BYTES: positiveInt.default(20_000),
  SLEEP_MAX_SECONDS: positiveInt.default(30),
  TOOL_TIMEOUT_MS: positiveInt.default(60_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  // blank values fall back to defaults, the way an empty line in .env reads
  const raw: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value;
  }
  if (!raw.SEARCH_URL && env.ELASTICSEARCH_URL) raw.SEARCH_URL = env.ELASTICSEARCH_URL;

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const cfg = parsed.data;
  if (cfg.HISTORY_KEEP_RECENT >= cfg.HISTORY_COMPACT_THRESHOLD) {
    throw new Error('Invalid configuration: HISTORY_KEEP_RECENT must be lower than HISTORY_COMPACT_THRESHOLD');
  }
  return cfg;
}
