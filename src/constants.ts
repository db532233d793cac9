import { join } from 'node:path';
import type { Party, RelationKind } from './types';

// Party classification rules, checked in order against the lower-cased party label
export const PARTY_RULES: ReadonlyArray<{ keyword: string; party: Party }> = [
  { keyword: 'conservative', party: 'Conservative' },
  { keyword: 'labour', party: 'Labour' },
  { keyword: 'liberal democrat', party: 'Liberal Democrat' },
];

export const PARTIES: readonly Party[] = ['Conservative', 'Labour', 'Liberal Democrat', 'Other'];

export const RELATION_KINDS = [
  'father',
  'mother',
  'uncle',
  'aunt',
  'husband',
  'wife',
  'brother',
  'sister',
  'grandparent-or-other',
] as const;

export const ANCESTOR_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>([
  'father',
  'mother',
  'uncle',
  'aunt',
  'grandparent-or-other',
]);

// Configuration constants for scraping and extraction
export const SCRAPING_CONFIG = {
  TIMEOUTS: {
    REQUEST: 30000,
  },
  POOL: {
    CONCURRENCY: 12,
    MAX_RETRIES: 1,
    RETRY_DELAY: 1000,
  },
  RELATIONS: {
    MODEL: 'claude-3-5-sonnet-latest',
    MAX_TOKENS: 2048,
  },
  FILES: {
    ROSTER: 'legislators.json',
    RELATIONS: 'legislator_relations.json',
    CSV: 'legislator_relations.csv',
  },
  USER_AGENT: 'mp-family-relations/0.1 (research scraper)',
} as const;

export interface AppConfig {
  outputDir: string;
  requestTimeout: number;
  concurrency: number;
  maxRetries: number;
  retryDelay: number;
  model: string;
  maxTokens: number;
}

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Resolve runtime configuration from environment variables, falling back to SCRAPING_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    outputDir: env.OUTPUT_DIR || join(process.cwd(), 'out'),
    requestTimeout: readNumber(env.REQUEST_TIMEOUT, SCRAPING_CONFIG.TIMEOUTS.REQUEST),
    concurrency: readNumber(env.WORKER_CONCURRENCY, SCRAPING_CONFIG.POOL.CONCURRENCY),
    maxRetries: readNumber(env.MAX_RETRIES, SCRAPING_CONFIG.POOL.MAX_RETRIES),
    retryDelay: readNumber(env.RETRY_DELAY, SCRAPING_CONFIG.POOL.RETRY_DELAY),
    model: env.RELATIONS_MODEL || SCRAPING_CONFIG.RELATIONS.MODEL,
    maxTokens: readNumber(env.RELATIONS_MAX_TOKENS, SCRAPING_CONFIG.RELATIONS.MAX_TOKENS),
  };
}
