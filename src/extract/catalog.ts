import type { MarkerRule, SelectorCatalog } from './fallback.js';

// ── Listing index ────────────────────────────────────────────
// Ordered by priority. Each catalog covers the search-result card, the
// store card and the seller hub row layouts the pages have shipped with.

export const CONTAINER_SELECTORS: SelectorCatalog = [
  'li.s-item',
  'article.str-item-card',
  'div.str-item-card',
  'li.s-card',
  'div.active-item',
];

export const FIELD_SELECTORS = {
  title: [
    '.s-item__title span[role="heading"]',
    '.s-item__title',
    '.str-item-card__property-title',
    '.s-card__title',
    'h3.item-title span',
  ],
  price: [
    '.s-item__price',
    '.str-item-card__property-displayPrice',
    '.s-card__price',
    '.item__price span.bold',
  ],
  shipping: [
    '.s-item__shipping',
    '.s-item__logisticsCost',
    '.str-item-card__property-shipping',
    '.s-card__shipping',
  ],
  condition: [
    '.s-item__subtitle .SECONDARY_INFO',
    '.SECONDARY_INFO',
    '.str-item-card__property-condition',
    '.s-card__subtitle',
  ],
  watchers: [
    '.s-item__watchCountTotal',
    '.str-item-card__property-watchers',
    '.me-item-activity__column:nth-child(2) .me-item-activity__column-count',
  ],
  seller: [
    '.s-item__seller-name',
    '.str-item-card__property-sellerName',
    '.s-card__seller',
  ],
  sellerFeedback: [
    '.s-item__seller-feedback',
    '.str-item-card__property-sellerFeedback',
  ],
  location: [
    '.s-item__location',
    '.s-item__itemLocation',
    '.str-item-card__property-location',
  ],
  quantityAvailable: [
    '.s-item__quantityAvailable',
    '.str-item-card__property-quantity',
    '.item__quantity span',
  ],
  notes: [
    '.s-item__hotness',
    '.s-item__urgency',
    '.str-item-card__signals span',
  ],
} as const satisfies Record<string, SelectorCatalog>;

export const MARKER_RULES = {
  buyItNow: {
    selectors: [
      '.s-item__purchase-options',
      '.s-item__formatBuyItNow',
      '.str-item-card__property-buyingFormat',
      '.s-card__attribute-row',
    ],
    phrases: ['buy it now'],
  },
  acceptsOffers: {
    selectors: [
      '.s-item__purchase-options',
      '.s-item__formatBestOfferEnabled',
      '.str-item-card__property-buyingFormat',
      '.s-card__attribute-row',
    ],
    phrases: ['best offer', 'make offer'],
  },
  isNewListing: {
    selectors: [
      '.s-item__title--tag',
      '.LIGHT_HIGHLIGHT',
      '.str-item-card__property-title',
    ],
    phrases: ['new listing'],
  },
} as const satisfies Record<string, MarkerRule>;

// Cards the index pads its grid with; they carry a price-less or fake title.
export const PLACEHOLDER_TITLES: readonly string[] = ['shop on ebay'];

// `/itm/<id>` or `/itm/<slug>/<id>`; the trailing digits are the item id.
export const ITEM_PATH_PATTERN = /\/itm\/(?:[^/?#]+\/)*(\d+)(?=[/?#]|$)/;

export const SEE_ALL_SELECTORS: SelectorCatalog = [
  '.str-marginals__footer a',
  'a[aria-label^="See all"]',
  'a[href*="_ssn="]',
];

// ── Seller card ──────────────────────────────────────────────

export const STATS_SELECTORS = {
  feedback: [
    '.str-seller-card__store-stats-content > div:nth-child(1)',
    '.str-seller-card__feedback-link',
    '[data-testid="seller-feedback"]',
  ],
  itemsSold: [
    '.str-seller-card__store-stats-content > div:nth-child(2)',
    '[data-testid="items-sold"]',
  ],
  followers: [
    '.str-seller-card__store-stats-content > div:nth-child(3)',
    '[data-testid="followers"]',
  ],
} as const satisfies Record<string, SelectorCatalog>;

// ── Seller hub funds ─────────────────────────────────────────

export const FUNDS_SELECTORS = [
  '.payment-tile--positive > div:nth-child(1) > div:nth-child(1) > span:nth-child(2) > a:nth-child(1)',
  '.payment-tile--positive a',
  '[data-testid="available-funds"]',
] as const satisfies SelectorCatalog;

// ── Item detail page ─────────────────────────────────────────

export interface SpecificsLayout {
  readonly row: string;
  readonly label: string;
  readonly value: string;
}

export const SPECIFICS_LAYOUTS: readonly SpecificsLayout[] = [
  {
    row: '.ux-layout-section-evo__col',
    label: '.ux-labels-values__labels',
    value: '.ux-labels-values__values',
  },
  {
    row: '.ux-labels-values',
    label: '.ux-labels-values__labels',
    value: '.ux-labels-values__values',
  },
  { row: '.itemAttr tr', label: 'td.attrLabels', value: 'td:not(.attrLabels)' },
  { row: 'dl.item-specifics div', label: 'dt', value: 'dd' },
];

export const DESCRIPTION_SELECTORS: SelectorCatalog = [
  '[data-testid="x-item-description-child"]',
  '.x-item-description-child',
  '#ds_div',
  '#desc_div',
];

export const DESCRIPTION_FRAME_SELECTOR = 'iframe#desc_ifr';

// ── Seller hub (offers) ──────────────────────────────────────

export const OFFER_SELECTORS = {
  sendButton: '.transactions-line-actions button.me-fake-button.btn--primary',
  card: '.pre-order-item',
  price: '.item-price .bold',
  amountInput: '#app-sio__offer-section__price',
  review: '.sio-button-PRIMARY',
} as const;
