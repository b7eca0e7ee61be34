import dotenv from 'dotenv';
import { z } from 'zod';
import { BROWSER_KINDS, type BrowserKind, type PipelineConfig } from '../types/schema';
import type { LlmCredentials } from '../types/extraction';
import { DEFAULT_PIPELINE_CONFIG } from './defaults';
import defaultLogger, { Logger } from '../utils/logger';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const browserKind = z.custom<BrowserKind>(
  (v) => typeof v === 'string' && (BROWSER_KINDS as readonly string[]).includes(v),
  { message: `expected one of ${BROWSER_KINDS.join(', ')}` }
);

const commaList = (v: unknown) =>
  typeof v === 'string' ? v.split(',').map((s) => s.trim()).filter(Boolean) : v;

const flag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // LLM provider (any OpenAI-compatible endpoint)
  LLM_API_KEY: z.string().min(1).optional(),
  GROQ_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().default('llama-3.3-70b-versatile'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),

  // Browser
  BROWSER_ENGINES: z.preprocess(commaList, z.array(browserKind).min(1).optional()),
  BROWSER_HEADLESS: flag.default('true'),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RELAXED_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RELAXED_NAVIGATION_RETRY: flag.optional(),

  // Stabilizer / matcher / synthesizer
  MAX_SCROLL_ATTEMPTS: z.coerce.number().int().positive().optional(),
  SCROLL_SETTLE_MS: z.coerce.number().int().nonnegative().optional(),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  MAX_SYNTHESIS_WORDS: z.coerce.number().int().positive().optional(),

  // OCR
  OCR_LANG_PATH: z.string().min(1).optional(),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env, logger: Logger = defaultLogger): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (parsed.success) return parsed.data;

  // Each invalid variable falls back on its own; the rest are kept.
  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  logger.error('Invalid environment values ignored', {
    keys: [...invalid],
    errors: parsed.error.flatten().fieldErrors,
  });
  const kept = Object.fromEntries(Object.entries(source).filter(([key]) => !invalid.has(key)));
  return envSchema.parse(kept);
}

/** Reads `.env` from the working directory, then parses `process.env`. */
export function loadEnv(logger: Logger = defaultLogger): EnvConfig {
  dotenv.config();
  return parseEnv(process.env, logger);
}

export function credentialsFromEnv(env: EnvConfig): LlmCredentials | null {
  const apiKey = env.LLM_API_KEY ?? env.GROQ_API_KEY ?? env.OPENAI_API_KEY;
  if (!apiKey) return null;
  const usingGroq = !env.LLM_API_KEY && env.GROQ_API_KEY !== undefined;
  const baseUrl = env.LLM_BASE_URL ?? (usingGroq ? GROQ_BASE_URL : undefined);
  return {
    apiKey,
    model: env.LLM_MODEL,
    ...(baseUrl !== undefined ? { baseUrl } : {}),
    ...(env.LLM_TEMPERATURE !== undefined ? { temperature: env.LLM_TEMPERATURE } : {}),
  };
}

export function buildPipelineConfig(env: EnvConfig, base: PipelineConfig = DEFAULT_PIPELINE_CONFIG): PipelineConfig {
  return {
    ...base,
    browser: {
      ...base.browser,
      engines: env.BROWSER_ENGINES ?? base.browser.engines,
      headless: env.BROWSER_HEADLESS,
      navigationTimeout: env.NAVIGATION_TIMEOUT_MS ?? base.browser.navigationTimeout,
      relaxedNavigationTimeout: env.RELAXED_NAVIGATION_TIMEOUT_MS ?? base.browser.relaxedNavigationTimeout,
      relaxedRetry: env.RELAXED_NAVIGATION_RETRY ?? base.browser.relaxedRetry,
    },
    stabilizer: {
      ...base.stabilizer,
      maxScrollAttempts: env.MAX_SCROLL_ATTEMPTS ?? base.stabilizer.maxScrollAttempts,
      settleDelayMs: env.SCROLL_SETTLE_MS ?? base.stabilizer.settleDelayMs,
    },
    vision: {
      ...base.vision,
      ...(env.OCR_LANG_PATH !== undefined ? { langPath: env.OCR_LANG_PATH } : {}),
    },
    matcher: {
      ...base.matcher,
      threshold: env.MATCH_THRESHOLD ?? base.matcher.threshold,
    },
    synthesizer: {
      ...base.synthesizer,
      maxWords: env.MAX_SYNTHESIS_WORDS ?? base.synthesizer.maxWords,
    },
  };
}
