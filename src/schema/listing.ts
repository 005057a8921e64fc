import { z } from 'zod';

// ── Listing ─────────────────────────────────────────────────

export const listingSchema = z.object({
  itemId: z.string().min(1).optional(),
  title: z.string(),
  price: z.string(),
  shipping: z.string(),
  condition: z.string(),
  watchers: z.number().int().nonnegative().optional(),
  seller: z.string(),
  sellerFeedback: z.string(),
  buyItNow: z.boolean(),
  acceptsOffers: z.boolean(),
  location: z.string(),
  quantityAvailable: z.number().int().nonnegative().optional(),
  isNewListing: z.boolean(),
  url: z.string(),
  notes: z.array(z.string()),
  itemSpecifics: z.array(z.string()),
  description: z.string().optional(),
});

export type Listing = z.infer<typeof listingSchema>;

/** A listing with every field at its default. */
export function emptyListing(): Listing {
  return {
    title: '',
    price: '',
    shipping: '',
    condition: '',
    seller: '',
    sellerFeedback: '',
    buyItNow: false,
    acceptsOffers: false,
    location: '',
    isNewListing: false,
    url: '',
    notes: [],
    itemSpecifics: [],
  };
}

/** Acceptance predicate: only listings with a title and a price are kept. */
export function isAcceptedListing(listing: Listing): boolean {
  return listing.title.trim().length > 0 && listing.price.trim().length > 0;
}

// ── Seller stats ────────────────────────────────────────────

/** Seller card figures; counts stay absent until they are read. */
export interface SellerStats {
  feedbackScore: string;
  itemsSold?: number | undefined;
  followerCount?: number | undefined;
  /** Seller hub balance as printed, e.g. "$1,234.56". */
  availableFunds?: string | undefined;
}
