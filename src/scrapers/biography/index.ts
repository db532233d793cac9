import { load } from 'cheerio';
import { StructuralParseError } from '../../errors';

export const BIOGRAPHY_CONFIG = {
  CONTENT_ID: 'mw-content-text',
} as const;

/**
 * Text of a biography page's main content region, whitespace-collapsed
 */
export function extractBiographyText(html: string, url?: string): string {
  const $ = load(html);
  const content = $(`#${BIOGRAPHY_CONFIG.CONTENT_ID}`).first();
  if (content.length === 0) {
    throw new StructuralParseError(`Could not find body element in ${url ?? 'page'}`, { url });
  }
  return content.text().replace(/\s+/g, ' ').trim();
}
