import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';

// ── Selector-fallback resolution ─────────────────────────────
// A catalog is an ordered list of CSS selectors for one logical field.
// Resolution never mixes selectors: the first one that yields a value wins.

export type SelectorCatalog = readonly string[];

export interface MarkerRule {
  readonly selectors: SelectorCatalog;
  readonly phrases: readonly string[];
}

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Text of the first selector whose first match has non-empty trimmed text. */
export function firstText(
  $: CheerioAPI,
  root: Cheerio<AnyNode>,
  catalog: SelectorCatalog,
): string | undefined {
  for (const selector of catalog) {
    for (const el of root.find(selector).toArray()) {
      const text = clean($(el).text());
      if (text) return text;
    }
  }
  return undefined;
}

/** Every non-empty text of the first selector that yields any. */
export function allTexts(
  $: CheerioAPI,
  root: Cheerio<AnyNode>,
  catalog: SelectorCatalog,
): string[] {
  for (const selector of catalog) {
    const texts = root
      .find(selector)
      .toArray()
      .map((el) => clean($(el).text()))
      .filter((t) => t.length > 0);
    if (texts.length > 0) return texts;
  }
  return [];
}

/**
 * Case-insensitive marker search: true when any candidate selector's text
 * contains any of the phrases.
 */
export function hasMarker(
  $: CheerioAPI,
  root: Cheerio<AnyNode>,
  rule: MarkerRule,
): boolean {
  const phrases = rule.phrases.map((p) => p.toLowerCase());
  for (const selector of rule.selectors) {
    for (const el of root.find(selector).toArray()) {
      const text = clean($(el).text()).toLowerCase();
      if (phrases.some((p) => text.includes(p))) return true;
    }
  }
  return false;
}

/** Matches of the first container selector that matches anything. */
export function firstMatching(
  $: CheerioAPI,
  catalog: SelectorCatalog,
): { selector: string; elements: AnyNode[] } | undefined {
  for (const selector of catalog) {
    const elements = $(selector).toArray();
    if (elements.length > 0) return { selector, elements };
  }
  return undefined;
}
