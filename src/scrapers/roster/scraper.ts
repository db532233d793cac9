import { load } from 'cheerio';
import { StructuralParseError } from '../../errors';
import type { PageFetcher } from '../../fetcher';
import { createStub } from '../../models';
import type { LegislatorStub } from '../../types';
import { ROSTER_CONFIG } from './constants';

export interface ExtractRosterOptions {
  url?: string;
  baseUrl?: string;
}

/**
 * Parse the roster table into legislator stubs.
 *
 * A stub's id is the index of its row in the table body, so header and spacer rows
 * still use up an id. Any missing table, body or anchor throws StructuralParseError.
 */
export function extractRoster(html: string, options: ExtractRosterOptions = {}): LegislatorStub[] {
  const { url, baseUrl = ROSTER_CONFIG.URLS.BASE_URL } = options;
  const $ = load(html);

  const table = $(`#${ROSTER_CONFIG.TABLE_ID}`).first();
  if (table.length === 0) {
    throw new StructuralParseError('Table not found', { url });
  }

  const body = table.find('tbody').first();
  if (body.length === 0) {
    throw new StructuralParseError('Table body not found', { url });
  }

  const stubs: LegislatorStub[] = [];

  for (const [id, row] of body.find('tr').toArray().entries()) {
    const cells = $(row).find('td');
    if (cells.length <= ROSTER_CONFIG.MIN_CELLS_EXCLUSIVE) continue;

    const nameLink = cells.eq(ROSTER_CONFIG.CELLS.NAME).find('a').last();
    if (nameLink.length === 0) {
      throw new StructuralParseError(`Name link not found in row ${id}`, { url });
    }
    const path = nameLink.attr('href');
    if (!path) {
      throw new StructuralParseError(`Path not found in row ${id}`, { url });
    }

    const partyLink = cells.eq(ROSTER_CONFIG.CELLS.PARTY).find('a').first();
    const rawParty = partyLink.attr('title');
    if (partyLink.length === 0 || rawParty === undefined) {
      throw new StructuralParseError(`Party not found in row ${id}`, { url });
    }

    stubs.push(
      createStub({
        id,
        name: nameLink.text().trim(),
        url: new URL(path, baseUrl).toString(),
        rawParty,
      })
    );
  }

  return stubs;
}

export class RosterScraper {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly rosterUrl: string = ROSTER_CONFIG.URLS.ROSTER
  ) {}

  /**
   * Fetch the roster page and extract every legislator on it
   */
  async scrape(): Promise<LegislatorStub[]> {
    console.log(`Scraping roster from ${this.rosterUrl}...`);
    const html = await this.fetcher.fetchHtml(this.rosterUrl);
    const stubs = extractRoster(html, { url: this.rosterUrl });

    if (stubs.length === 0) {
      throw new StructuralParseError(
        'No legislators were found. The page structure may have changed.',
        { url: this.rosterUrl }
      );
    }

    console.log(`Found ${stubs.length} legislators`);
    return stubs;
  }
}
