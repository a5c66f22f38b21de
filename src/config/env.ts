import 'dotenv/config';
import cron from 'node-cron';
import { z } from 'zod';

function parseFlag(fallback: boolean) {
  return (v: string | undefined): boolean => {
    if (v == null) return fallback;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true' || s === 'yes') return true;
    if (s === '0' || s === 'false' || s === 'no') return false;
    return fallback;
  };
}

const cronExpression = z
  .string()
  .refine((expr) => cron.validate(expr), { message: 'Invalid cron expression' });

const envSchema = z
  .object({
    // Working copy; cloned from ORIGIN_URL when it is not a repository yet
    REPO_DIR: z.string().min(1).default('.'),
    ORIGIN_REMOTE: z.string().min(1).default('origin'),
    ORIGIN_URL: z.string().min(1).optional(),

    // Where epithets.json is mirrored from
    UPSTREAM_REMOTE: z.string().min(1).default('upstream'),
    UPSTREAM_URL: z.string().min(1),
    UPSTREAM_BRANCH: z.string().min(1).default('master'),

    EPITHETS_PATH: z.string().min(1).default('epithets.json'),
    ETYMOLOGIES_PATH: z.string().min(1).default('etymologies.json'),

    // Runs through the shell with no arguments, like a CI `run:` step, from a
    // temporary directory; ./ and ../ words resolve against REPO_DIR
    GENERATOR_COMMAND: z.string().min(1).default('./etymology.py'),
    // e.g. "python -m pip install -r requirements.txt"
    GENERATOR_SETUP_COMMAND: z.string().min(1).optional(),
    GENERATOR_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(1800),

    GIT_USER_NAME: z.string().min(1).default('Sync Bot'),
    GIT_USER_EMAIL: z.string().email().default('no-reply@example.com'),

    EPITHET_COMMIT_MESSAGE: z.string().min(1).default('Automated epithet update from GitHub Action'),
    ETYMOLOGY_COMMIT_MESSAGE: z.string().min(1).default('Automated etymology update from GitHub Action'),
    COMMIT_CHANGELOG: z.string().optional().transform(parseFlag(true)),

    CRON_SYNC_SCHEDULE: cronExpression.default('37 13 * * *'),
    CRON_TIMEZONE: z.string().min(1).default('UTC'),
    RUN_ON_START: z.string().optional().transform(parseFlag(false)),

    // Lease + run history backend
    LOCK_BACKEND: z.enum(['memory', 'mysql', 'postgres']).default('memory'),
    LOCK_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    LOCK_WAIT_RETRIES: z.coerce.number().int().nonnegative().default(5),

    MYSQL_URL: z.string().min(1).optional(),
    POSTGRES_URL: z.string().min(1).optional(),

    // MySQL TLS, off unless set
    MYSQL_SSL: z.string().optional().transform(parseFlag(false)),
    MYSQL_SSL_REJECT_UNAUTHORIZED: z.string().optional().transform(parseFlag(true)),
    POSTGRES_SSL_REJECT_UNAUTHORIZED: z.string().optional().transform(parseFlag(true))
  })
  .superRefine((cfg, ctx) => {
    if (cfg.LOCK_BACKEND === 'mysql' && !cfg.MYSQL_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MYSQL_URL'], message: 'MYSQL_URL is required when LOCK_BACKEND=mysql' });
    }
    if (cfg.LOCK_BACKEND === 'postgres' && !cfg.POSTGRES_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['POSTGRES_URL'], message: 'POSTGRES_URL is required when LOCK_BACKEND=postgres' });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

let cached: Env | undefined;

/**
 * Parsed process environment. Lazy so that modules importing config types
 * (and the tests) do not require a complete environment.
 */
export function getEnv(): Env {
  cached ??= parseEnv(process.env);
  return cached;
}
