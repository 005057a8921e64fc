// ── Count parsing ─────────────────────────────────────────────
// Marketplace pages print counts as "1,234", "1.2K sold" or "12 watchers".

// The suffix must end a word: "3 more available" is 3, not 3M.
const COUNT_PATTERN = /(\d[\d,]*(?:\.\d+)?)\s*([kKmM])?\b/;

/** First count found in `text`, or `undefined` when there is none. */
export function parseCount(text: string): number | undefined {
  const match = COUNT_PATTERN.exec(text);
  if (!match?.[1]) return undefined;

  const value = Number(match[1].replace(/,/g, ''));
  if (Number.isNaN(value)) return undefined;

  switch (match[2]?.toLowerCase()) {
    case 'k':
      return Math.round(value * 1_000);
    case 'm':
      return Math.round(value * 1_000_000);
    default:
      return Math.round(value);
  }
}
