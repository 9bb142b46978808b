/**
 * Popcast — Configuration
 *
 * Reads the process environment (populated from .env by dotenv in the
 * entry point), validates it with zod and returns a typed config.
 */

import { z } from 'zod';
import { ConfigError } from './lib/errors';
import type { FandomSelection } from './types';

// ============================================================
// SCHEMA
// ============================================================

export const DEFAULT_DENY_LIST = [
  'mlb',
  'mls',
  'nfl',
  'nba',
  'nhl',
  'disney',
  'baseball',
  'basketball',
  'hockey',
] as const;

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value =>
      value
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0)
    );

// dotenv turns `KEY=` into an empty string; treat that as unset
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (value === '' ? undefined : value), schema.optional());

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .default('false')
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z
  .object({
    CHECK_INTERVAL_MINUTES: z.coerce.number().int().positive().default(180),
    CATALOG_REGION: z.string().trim().toLowerCase().default('pl'),
    SCRAPE_PAGES: commaList('sale,new-releases,exclusives').pipe(
      z.array(z.string()).min(1, 'at least one page is required')
    ),
    MAX_POSTS_PER_CHECK: z.coerce.number().int().min(0).default(0),
    POST_DELAY_SECONDS: z.coerce.number().int().min(0).default(0),
    FANDOMS: commaList('All'),
    DENY_LIST: commaList(DEFAULT_DENY_LIST.join(',')),
    DRY_RUN: booleanFlag,
    IMAGE_FAILURE_POLICY: z.enum(['skip', 'text_only']).default('skip'),
    FETCH_CONCURRENCY: z.coerce.number().int().min(1).default(3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    LEDGER_BACKEND: z.enum(['file', 'supabase']).default('file'),
    LEDGER_PATH: z.string().min(1).default('data/announced.jsonl'),
    LEDGER_TABLE: z.string().min(1).default('announced_items'),
    SUPABASE_URL: optional(z.string().url()),
    SUPABASE_SERVICE_ROLE_KEY: optional(z.string()),

    PUBLISHER: z.enum(['bluesky', 'slack']).default('bluesky'),
    BLUESKY_SERVICE: z.string().url().default('https://bsky.social'),
    BLUESKY_HANDLE: optional(z.string()),
    BLUESKY_APP_PASSWORD: optional(z.string()),
    SLACK_WEBHOOK_URL: optional(z.string().url()),
  })
  .superRefine((env, ctx) => {
    if (env.LEDGER_BACKEND === 'supabase') {
      if (!env.SUPABASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'required for the supabase ledger' });
      }
      if (!env.SUPABASE_SERVICE_ROLE_KEY) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_SERVICE_ROLE_KEY'], message: 'required for the supabase ledger' });
      }
    }
  });

// ============================================================
// TYPES
// ============================================================

export type LedgerConfig =
  | { backend: 'file'; path: string }
  | { backend: 'supabase'; url: string; serviceRoleKey: string; table: string };

export type PublisherConfig =
  | { kind: 'bluesky'; service: string; handle?: string; appPassword?: string }
  | { kind: 'slack'; webhookUrl?: string };

export type ImageFailurePolicy = 'skip' | 'text_only';

export interface PopcastConfig {
  checkIntervalMinutes: number;
  region: string;
  scrapePages: string[];
  maxPostsPerCheck: number;
  postDelaySeconds: number;
  fandoms: FandomSelection;
  denyList: string[];
  dryRun: boolean;
  imageFailurePolicy: ImageFailurePolicy;
  fetchConcurrency: number;
  requestTimeoutMs: number;
  ledger: LedgerConfig;
  publisher: PublisherConfig;
}

/** Values from the command line that win over the environment. */
export interface ConfigOverrides {
  dryRun?: boolean;
}

// ============================================================
// LOADING
// ============================================================

function toFandomSelection(fandoms: string[]): FandomSelection {
  if (fandoms.length === 0) return 'All';
  if (fandoms.some(f => f.toLowerCase() === 'all')) return 'All';
  return fandoms;
}

/**
 * Build a config from an environment record.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): PopcastConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const dryRun = overrides.dryRun ?? e.DRY_RUN;

  const ledger: LedgerConfig =
    e.LEDGER_BACKEND === 'supabase' && e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? {
          backend: 'supabase',
          url: e.SUPABASE_URL,
          serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
          table: e.LEDGER_TABLE,
        }
      : { backend: 'file', path: e.LEDGER_PATH };

  const publisher: PublisherConfig =
    e.PUBLISHER === 'slack'
      ? { kind: 'slack', webhookUrl: e.SLACK_WEBHOOK_URL }
      : {
          kind: 'bluesky',
          service: e.BLUESKY_SERVICE,
          handle: e.BLUESKY_HANDLE,
          appPassword: e.BLUESKY_APP_PASSWORD,
        };

  if (!dryRun) {
    const missing = missingPublisherCredentials(publisher);
    if (missing.length > 0) {
      throw new ConfigError(missing.map(key => `${key}: required unless running with --dry-run`));
    }
  }

  return {
    checkIntervalMinutes: e.CHECK_INTERVAL_MINUTES,
    region: e.CATALOG_REGION,
    scrapePages: e.SCRAPE_PAGES,
    maxPostsPerCheck: e.MAX_POSTS_PER_CHECK,
    postDelaySeconds: e.POST_DELAY_SECONDS,
    fandoms: toFandomSelection(e.FANDOMS),
    denyList: e.DENY_LIST.map(d => d.toLowerCase()),
    dryRun,
    imageFailurePolicy: e.IMAGE_FAILURE_POLICY,
    fetchConcurrency: e.FETCH_CONCURRENCY,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    ledger,
    publisher,
  };
}

function missingPublisherCredentials(publisher: PublisherConfig): string[] {
  if (publisher.kind === 'slack') {
    return publisher.webhookUrl ? [] : ['SLACK_WEBHOOK_URL'];
  }

  const missing: string[] = [];
  if (!publisher.handle) missing.push('BLUESKY_HANDLE');
  if (!publisher.appPassword) missing.push('BLUESKY_APP_PASSWORD');
  return missing;
}

/**
 * Config fields that are safe to log (no secrets).
 */
export function describeConfig(config: PopcastConfig): Record<string, unknown> {
  return {
    region: config.region || 'us',
    scrapePages: config.scrapePages,
    checkIntervalMinutes: config.checkIntervalMinutes,
    maxPostsPerCheck: config.maxPostsPerCheck,
    postDelaySeconds: config.postDelaySeconds,
    fandoms: config.fandoms,
    denyList: config.denyList,
    dryRun: config.dryRun,
    imageFailurePolicy: config.imageFailurePolicy,
    ledger: config.ledger.backend,
    publisher: config.publisher.kind,
  };
}
