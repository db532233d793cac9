import type { CheckpointStore } from './cache';
import { SCRAPING_CONFIG } from './constants';
import { StructuralParseError, toError } from './errors';
import type { PageFetcher } from './fetcher';
import { createRecord, type ResultSet } from './models';
import type { RelationExtractor } from './relations';
import { extractBiographyText } from './scrapers/biography';
import type { LegislatorRecord, LegislatorStub } from './types';

export type ItemOutcome = 'processed' | 'skipped' | 'failed';

export interface ProgressEvent {
  completed: number;
  total: number;
  stub: LegislatorStub;
  outcome: ItemOutcome;
}

export interface WorkerPoolOptions {
  concurrency?: number;
  maxRetries?: number;
  retryDelay?: number;
  onProgress?: (event: ProgressEvent) => void;
}

export interface WorkerPoolDependencies {
  fetcher: PageFetcher;
  extractor: RelationExtractor;
  checkpoint: CheckpointStore;
}

export interface ItemFailure {
  stub: LegislatorStub;
  error: Error;
}

export interface WorkerPoolResult {
  records: LegislatorRecord[];
  processed: number;
  skipped: number;
  failures: ItemFailure[];
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function logProgress({ completed, total, stub, outcome }: ProgressEvent): void {
  const marker = outcome === 'failed' ? '✗' : outcome === 'skipped' ? '↷' : '✓';
  console.log(`[${completed}/${total}] ${marker} ${stub.name} (${outcome})`);
}

/**
 * Drains a fixed list of legislators with a bounded number of concurrent workers.
 *
 * Ids already in the result set are skipped without touching the network, so a re-run
 * resumes where the last checkpoint left off. A failed item is logged, recorded in
 * `failures` and the checkpoint is flushed; the worker then moves on to the next item.
 * The checkpoint is flushed once more when the run ends, however it ends.
 */
export class ResumableWorkerPool {
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly onProgress: (event: ProgressEvent) => void;

  constructor(
    private readonly deps: WorkerPoolDependencies,
    options: WorkerPoolOptions = {}
  ) {
    const {
      concurrency = SCRAPING_CONFIG.POOL.CONCURRENCY,
      maxRetries = SCRAPING_CONFIG.POOL.MAX_RETRIES,
      retryDelay = SCRAPING_CONFIG.POOL.RETRY_DELAY,
      onProgress = logProgress,
    } = options;

    // Normalize inputs to prevent a zero-worker pool and negative delays
    this.concurrency = Math.max(1, Math.floor(Number(concurrency) || 1));
    this.maxRetries = Math.max(0, Math.floor(Number(maxRetries) || 0));
    this.retryDelay = Math.max(0, Math.floor(Number(retryDelay) || 0));
    this.onProgress = onProgress;
  }

  async run(stubs: readonly LegislatorStub[], results: ResultSet): Promise<WorkerPoolResult> {
    const queue = [...stubs];
    const total = queue.length;
    const failures: ItemFailure[] = [];
    let completed = 0;
    let processed = 0;
    let skipped = 0;

    const report = (stub: LegislatorStub, outcome: ItemOutcome) => {
      completed += 1;
      this.onProgress({ completed, total, stub, outcome });
    };

    const worker = async (): Promise<void> => {
      for (let stub = queue.shift(); stub !== undefined; stub = queue.shift()) {
        if (results.has(stub.id)) {
          skipped += 1;
          report(stub, 'skipped');
          continue;
        }

        let record: LegislatorRecord;
        try {
          record = await this.processStub(stub);
        } catch (error) {
          const err = toError(error);
          console.error(
            `Error extracting relations for #${stub.id} ${stub.name} (${stub.url}): ${err.message}`
          );
          failures.push({ stub, error: err });
          this.flushAfterFailure(results);
          report(stub, 'failed');
          continue;
        }

        results.add(record);
        processed += 1;
        report(stub, 'processed');
      }
    };

    const workerCount = Math.min(this.concurrency, Math.max(1, total));
    console.log(`Extracting relations for ${total} legislators with ${workerCount} workers...`);

    try {
      const settled = await Promise.allSettled(Array.from({ length: workerCount }, worker));
      const crashed = settled.find(
        (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
      );
      if (crashed) {
        throw toError(crashed.reason);
      }
    } finally {
      this.flush(results);
    }

    console.log(
      `Completed relation extraction. Processed: ${processed}, skipped: ${skipped}, failed: ${failures.length}`
    );

    return { records: results.toArray(), processed, skipped, failures };
  }

  private async processStub(stub: LegislatorStub): Promise<LegislatorRecord> {
    for (let attempt = 1; ; attempt++) {
      try {
        const html = await this.deps.fetcher.fetchHtml(stub.url);
        const text = extractBiographyText(html, stub.url);
        const relations = await this.deps.extractor.extract(text);
        return createRecord(stub, relations);
      } catch (error) {
        // A page without a content region will not grow one on retry
        if (attempt > this.maxRetries || error instanceof StructuralParseError) {
          throw error;
        }
        console.warn(
          `Retrying #${stub.id} ${stub.name} (${attempt}/${this.maxRetries}): ${toError(error).message}`
        );
        if (this.retryDelay > 0) {
          await sleep(this.retryDelay);
        }
      }
    }
  }

  private flush(results: ResultSet): void {
    if (results.size === 0) return;
    this.deps.checkpoint.save(results.toArray());
  }

  // Best-effort: a failing save here is reported, and the final flush raises it
  private flushAfterFailure(results: ResultSet): void {
    try {
      this.flush(results);
    } catch (error) {
      console.warn('Failed to save checkpoint after item failure:', error);
    }
  }
}
