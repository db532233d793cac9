import { existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { z } from 'zod';
import { SCRAPING_CONFIG } from './constants';
import { CheckpointError } from './errors';
import { createRecord, createStub } from './models';
import { RelationsFileSchema, RosterFileSchema } from './schemas';
import type { LegislatorRecord, LegislatorStub } from './types';

export interface CheckpointStore {
  save(records: readonly LegislatorRecord[]): void;
}

/**
 * Read and validate a JSON checkpoint. Returns null when the file does not exist;
 * a file that exists but fails validation is an error, never silently ignored.
 */
function readCheckpoint<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CheckpointError(`Failed to read checkpoint ${filePath}`, { filePath, cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid';
    throw new CheckpointError(`Invalid checkpoint ${filePath} (${where})`, {
      filePath,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// Whole-file rewrite through a temporary file so a crash never leaves a truncated checkpoint
function writeCheckpoint(filePath: string, data: unknown): void {
  const tempPath = `${filePath}.tmp`;
  writeFileSync(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  renameSync(tempPath, filePath);
}

function assertUniqueIds(filePath: string, items: ReadonlyArray<{ id: number }>): void {
  const seen = new Set<number>();
  for (const { id } of items) {
    if (seen.has(id)) {
      throw new CheckpointError(`Duplicate legislator id ${id} in ${filePath}`, { filePath });
    }
    seen.add(id);
  }
}

export function ensureOutputDir(outputDir: string): void {
  mkdirSync(outputDir, { recursive: true });
}

/**
 * Load the cached roster (legislators.json), or null when it has not been scraped yet
 */
export function loadRoster(outputDir: string): LegislatorStub[] | null {
  const filePath = join(outputDir, SCRAPING_CONFIG.FILES.ROSTER);
  const data = readCheckpoint(filePath, RosterFileSchema);
  if (!data) {
    return null;
  }
  assertUniqueIds(filePath, data);
  return data.map((stub) => createStub(stub));
}

export function saveRoster(stubs: readonly LegislatorStub[], outputDir: string): string {
  ensureOutputDir(outputDir);
  const filePath = join(outputDir, SCRAPING_CONFIG.FILES.ROSTER);
  writeCheckpoint(filePath, stubs);
  return filePath;
}

/**
 * The relations checkpoint (legislator_relations.json). Loaded once at start,
 * rewritten wholesale on every save.
 */
export class RelationsCheckpoint implements CheckpointStore {
  readonly filePath: string;

  constructor(private readonly outputDir: string) {
    this.filePath = join(outputDir, SCRAPING_CONFIG.FILES.RELATIONS);
  }

  load(): LegislatorRecord[] {
    const data = readCheckpoint(this.filePath, RelationsFileSchema);
    if (!data) {
      return [];
    }
    assertUniqueIds(this.filePath, data);
    return data.map((record) => createRecord(record, record.relations));
  }

  save(records: readonly LegislatorRecord[]): void {
    ensureOutputDir(this.outputDir);
    writeCheckpoint(this.filePath, records);
  }
}

/**
 * Get cache age for display
 */
export function getCacheInfo(filePath: string): string | null {
  if (!existsSync(filePath)) {
    return null;
  }

  const ageMs = Date.now() - statSync(filePath).mtime.getTime();
  const ageHours = Math.floor(ageMs / (60 * 60 * 1000));
  const ageMinutes = Math.floor((ageMs % (60 * 60 * 1000)) / (60 * 1000));

  if (ageHours > 0) {
    return `${ageHours}h ${ageMinutes}m ago`;
  }
  return `${ageMinutes}m ago`;
}
