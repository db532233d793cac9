import { join } from 'node:path';
import { getCacheInfo, loadRoster, RelationsCheckpoint, saveRoster } from './cache';
import { type AppConfig, loadConfig, SCRAPING_CONFIG } from './constants';
import { HtmlFetcher, type PageFetcher } from './fetcher';
import { ResultSet } from './models';
import { ResumableWorkerPool, type WorkerPoolOptions, type WorkerPoolResult } from './pool';
import type { RelationExtractor } from './relations';
import { RosterScraper } from './scrapers/roster';
import type { LegislatorStub } from './types';

export interface RelationsPipelineOptions {
  config?: AppConfig;
  fetcher?: PageFetcher;
}

/**
 * Roster scrape followed by resumable relation extraction, both checkpointed under
 * the configured output directory.
 */
export class RelationsPipeline {
  private readonly config: AppConfig;
  private readonly fetcher: PageFetcher;
  private readonly ownedFetcher: HtmlFetcher | null = null;

  constructor(options: RelationsPipelineOptions = {}) {
    this.config = options.config ?? loadConfig();
    if (options.fetcher) {
      this.fetcher = options.fetcher;
    } else {
      this.ownedFetcher = new HtmlFetcher({ timeout: this.config.requestTimeout });
      this.fetcher = this.ownedFetcher;
    }
  }

  async initialize(): Promise<void> {
    await this.ownedFetcher?.initialize();
  }

  async close(): Promise<void> {
    await this.ownedFetcher?.close();
  }

  /**
   * Load legislators.json when present, otherwise scrape the roster page and cache it
   */
  async loadRoster(options: { forceRefresh?: boolean } = {}): Promise<LegislatorStub[]> {
    const { forceRefresh = false } = options;

    if (forceRefresh) {
      console.log('Force refresh requested - ignoring cached roster');
    } else {
      const cached = loadRoster(this.config.outputDir);
      if (cached) {
        const cacheAge = getCacheInfo(join(this.config.outputDir, SCRAPING_CONFIG.FILES.ROSTER));
        console.log(`Loaded ${cached.length} legislators from cache`);
        if (cacheAge) {
          console.log(`Cache created: ${cacheAge}`);
        }
        return cached;
      }
    }

    const stubs = await new RosterScraper(this.fetcher).scrape();
    const outputPath = saveRoster(stubs, this.config.outputDir);
    console.log(`Roster saved to ${outputPath}`);
    return stubs;
  }

  /**
   * Run the worker pool over the roster, resuming from legislator_relations.json
   */
  async extractRelations(
    stubs: readonly LegislatorStub[],
    extractor: RelationExtractor,
    options: Pick<WorkerPoolOptions, 'onProgress'> = {}
  ): Promise<WorkerPoolResult> {
    const checkpoint = new RelationsCheckpoint(this.config.outputDir);
    const results = new ResultSet(checkpoint.load());
    if (results.size > 0) {
      console.log(`Resuming with ${results.size} legislators from ${checkpoint.filePath}`);
    }

    const pool = new ResumableWorkerPool(
      { fetcher: this.fetcher, extractor, checkpoint },
      {
        concurrency: this.config.concurrency,
        maxRetries: this.config.maxRetries,
        retryDelay: this.config.retryDelay,
        ...options,
      }
    );
    return pool.run(stubs, results);
  }
}
