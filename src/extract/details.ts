import * as cheerio from 'cheerio';

import {
  DESCRIPTION_FRAME_SELECTOR,
  DESCRIPTION_SELECTORS,
  SPECIFICS_LAYOUTS,
} from './catalog.js';
import { firstText } from './fallback.js';

// ── Public types ─────────────────────────────────────────────

export interface ItemDetails {
  itemSpecifics: string[];
  description: string | undefined;
  /** Source of the description frame when the description is not inline. */
  descriptionFrameUrl: string | undefined;
}

// ── Extractor ────────────────────────────────────────────────

/**
 * Pull item specifics ("label: value") and the description out of an item
 * detail page. The first specifics layout producing any pair wins.
 */
export function extractItemDetails(html: string): ItemDetails {
  const $ = cheerio.load(html);
  const root = $.root();

  let itemSpecifics: string[] = [];
  for (const layout of SPECIFICS_LAYOUTS) {
    const pairs: string[] = [];
    for (const row of root.find(layout.row).toArray()) {
      const label = firstText($, $(row), [layout.label]);
      const value = firstText($, $(row), [layout.value]);
      if (label && value) {
        pairs.push(`${label.replace(/:\s*$/, '')}: ${value}`);
      }
    }
    if (pairs.length > 0) {
      itemSpecifics = pairs;
      break;
    }
  }

  const description = firstText($, root, DESCRIPTION_SELECTORS);
  const frameSrc = root.find(DESCRIPTION_FRAME_SELECTOR).attr('src');

  return {
    itemSpecifics,
    description,
    descriptionFrameUrl: description === undefined && frameSrc ? frameSrc : undefined,
  };
}

/** Body text of a standalone description document. */
export function extractDescriptionDocument(html: string): string | undefined {
  const $ = cheerio.load(html);
  $('script, style').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim();
  return text || undefined;
}
