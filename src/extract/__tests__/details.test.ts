import { describe, expect, test } from 'vitest';

import { extractDescriptionDocument, extractItemDetails } from '../details.js';

describe('extractItemDetails', () => {
  test('reads label/value pairs and an inline description', () => {
    const html = `
      <div class="ux-labels-values">
        <div class="ux-labels-values__labels">Brand:</div>
        <div class="ux-labels-values__values">Acme</div>
      </div>
      <div class="ux-labels-values">
        <div class="ux-labels-values__labels">Color</div>
        <div class="ux-labels-values__values">Red</div>
      </div>
      <div data-testid="x-item-description-child">Mint   condition.</div>`;

    expect(extractItemDetails(html)).toEqual({
      itemSpecifics: ['Brand: Acme', 'Color: Red'],
      description: 'Mint condition.',
      descriptionFrameUrl: undefined,
    });
  });

  test('falls back to the table layout', () => {
    const html = `
      <table class="itemAttr"><tr>
        <td class="attrLabels">Model:</td><td>X-100</td>
      </tr></table>`;

    expect(extractItemDetails(html).itemSpecifics).toEqual(['Model: X-100']);
  });

  test('reports the description frame when there is no inline description', () => {
    const html = '<iframe id="desc_ifr" src="https://shop.test/desc/9"></iframe>';

    const details = extractItemDetails(html);
    expect(details.description).toBeUndefined();
    expect(details.descriptionFrameUrl).toBe('https://shop.test/desc/9');
  });
});

describe('extractDescriptionDocument', () => {
  test('returns the body text without scripts', () => {
    const html = '<html><body><p>Ships  in original box.</p><script>var x = 1;</script></body></html>';
    expect(extractDescriptionDocument(html)).toBe('Ships in original box.');
  });

  test('returns undefined for an empty body', () => {
    expect(extractDescriptionDocument('<html><body> </body></html>')).toBeUndefined();
  });
});
