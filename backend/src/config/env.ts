/**
 * Environment Configuration
 * Parses process.env once into a typed config; invalid values fail at boot.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../middleware/errorHandler';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(v => (v ? Number.parseInt(v, 10) : fallback))
    .pipe(z.number().int().positive());

const unitFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(v => (v ? Number.parseFloat(v) : fallback))
    .pipe(z.number().min(0).max(1));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intFromEnv(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  FRONTEND_URL: z.string().default('http://localhost:3001'),

  // Classifier
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o'),
  CLASSIFIER_TIMEOUT_MS: intFromEnv(30000),

  // Data locations (relative to the working directory)
  PROTOCOLS_PATH: z.string().default('data/protocols.json'),
  CASES_PATH: z.string().default('data/cases.json'),
  SPECIALIZATIONS_PATH: z.string().default('data/specializations.json'),
  RED_FLAG_CASES_PATH: z.string().default('data/red-flag-cases.json'),
  EXEMPLARS_DIR: z.string().default('compiled'),

  // Matching and routing policy
  PROTOCOL_TOP_K: intFromEnv(3),
  ROUTER_MIN_CONFIDENCE: z
    .string()
    .optional()
    .transform(v => (v ? Number.parseFloat(v) : undefined))
    .pipe(z.number().min(0).optional()),

  // Safety scoring policy
  SAFETY_OVER_TRIAGE_SCORE: unitFromEnv(0.7),
  SAFETY_UNDER_TRIAGE_SCORE: unitFromEnv(0.3),

  // Exemplar compilation
  MAX_BOOTSTRAPPED_DEMOS: intFromEnv(8),
  MAX_LABELED_DEMOS: intFromEnv(4),
  COMPILE_CONCURRENCY: intFromEnv(2),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const env = result.data;
  if (env.SAFETY_OVER_TRIAGE_SCORE <= env.SAFETY_UNDER_TRIAGE_SCORE) {
    throw new InvalidConfigurationError(
      'SAFETY_OVER_TRIAGE_SCORE must be greater than SAFETY_UNDER_TRIAGE_SCORE'
    );
  }
  return env;
}
