import { type APIRequestContext, type APIResponse, request } from 'playwright';
import { SCRAPING_CONFIG } from './constants';
import { FetchError } from './errors';

export interface PageFetcher {
  fetchHtml(url: string): Promise<string>;
}

export interface HtmlFetcherOptions {
  timeout?: number;
  userAgent?: string;
}

/**
 * Fetches HTML documents over Playwright's API request context. No browser is launched.
 */
export class HtmlFetcher implements PageFetcher {
  private context: APIRequestContext | null = null;
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: HtmlFetcherOptions = {}) {
    this.timeout = options.timeout ?? SCRAPING_CONFIG.TIMEOUTS.REQUEST;
    this.userAgent = options.userAgent ?? SCRAPING_CONFIG.USER_AGENT;
  }

  async initialize(): Promise<void> {
    if (this.context) return;
    this.context = await request.newContext({
      timeout: this.timeout,
      userAgent: this.userAgent,
    });
  }

  async close(): Promise<void> {
    if (this.context) {
      await this.context.dispose();
    }
    this.context = null;
  }

  async fetchHtml(url: string): Promise<string> {
    if (!this.context) {
      throw new Error('Request context not initialized. Call initialize() first.');
    }

    let response: APIResponse;
    try {
      response = await this.context.get(url, { timeout: this.timeout });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Request to ${url} failed: ${reason}`, { url, cause: error });
    }

    try {
      if (!response.ok()) {
        throw new FetchError(`HTTP ${response.status()} fetching ${url}`, {
          url,
          status: response.status(),
        });
      }

      const contentType = response.headers()['content-type'] ?? '';
      if (!contentType.startsWith('text/html')) {
        throw new FetchError(
          `Expected HTML content from ${url}, got ${contentType || 'no content-type'}`,
          { url, status: response.status() }
        );
      }

      return await response.text();
    } finally {
      await response.dispose();
    }
  }
}
