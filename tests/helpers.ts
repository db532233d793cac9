import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CheckpointStore } from '../src/cache';
import { FetchError } from '../src/errors';
import type { PageFetcher } from '../src/fetcher';
import type { RelationExtractor } from '../src/relations';
import type { FamilyRelation, LegislatorRecord } from '../src/types';

export interface RosterRowInput {
  name: string;
  path: string;
  party: string;
}

export function rosterRow({ name, path, party }: RosterRowInput): string {
  return `<tr>
    <td>Constituency</td><td>Region</td><td>1,234</td>
    <td><a href="/wiki/File:Portrait.jpg">portrait</a> <a href="${path}"> ${name} </a></td>
    <td></td>
    <td><a href="/wiki/Party_page" title="${party}">${party}</a></td>
  </tr>`;
}

export const ROSTER_HEADER =
  '<tr><th>Constituency</th><th>Region</th><th>Majority</th><th>MP</th><th></th><th>Party</th></tr>';

// Header in <thead>, so the first body row has index 0
export function rosterPage(rows: string[]): string {
  return `<html><body>
    <table id="elected-mps"><thead>${ROSTER_HEADER}</thead><tbody>
      ${rows.join('\n')}
    </tbody></table>
  </body></html>`;
}

export function biographyPage(text: string): string {
  return `<html><body>
    <div id="siteNotice">Donate</div>
    <div id="mw-content-text"><p>${text}</p></div>
  </body></html>`;
}

/**
 * In-memory fetcher. Unknown URLs answer with a 404 FetchError.
 */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  // Number of upcoming requests to fail, per URL
  private readonly failures = new Map<string, number>();

  constructor(
    private readonly pages: Map<string, string>,
    private readonly delayMs = 0
  ) {}

  failNext(url: string, times = 1): void {
    this.failures.set(url, times);
  }

  async fetchHtml(url: string): Promise<string> {
    this.calls.push(url);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));

      const remaining = this.failures.get(url) ?? 0;
      if (remaining > 0) {
        this.failures.set(url, remaining - 1);
        throw new FetchError(`HTTP 503 fetching ${url}`, { url, status: 503 });
      }

      const page = this.pages.get(url);
      if (page === undefined) {
        throw new FetchError(`HTTP 404 fetching ${url}`, { url, status: 404 });
      }
      return page;
    } finally {
      this.inFlight -= 1;
    }
  }
}

/**
 * Extractor that answers from a lookup on the page text.
 */
export class FakeExtractor implements RelationExtractor {
  readonly texts: string[] = [];

  constructor(private readonly answer: (text: string) => FamilyRelation[] = () => []) {}

  async extract(text: string): Promise<FamilyRelation[]> {
    this.texts.push(text);
    return this.answer(text);
  }
}

export class MemoryCheckpoint implements CheckpointStore {
  readonly saves: LegislatorRecord[][] = [];

  save(records: readonly LegislatorRecord[]): void {
    this.saves.push([...records]);
  }

  lastSavedIds(): number[] {
    const last = this.saves[this.saves.length - 1] ?? [];
    return last.map((record) => record.id).sort((a, b) => a - b);
  }
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'mp-relations-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export const silentProgress = () => {};
