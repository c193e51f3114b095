/**
 * Standing sell order posted by a seller.
 *
 * minPrice is the price of one whole offerToken unit denominated in bidToken
 * base units. offerTokenDecimals is snapshotted from the ledger when the
 * offer is created so later decimal changes do not move the price check.
 */
export interface Offer {
  id: bigint;
  seller: string;
  offerToken: string;
  bidToken: string;
  minPrice: bigint;
  minBidSize: bigint;
  totalSize: bigint;
  offerTokenDecimals: number;
}

/**
 * Caller-supplied fields for createOffer. The seller is the caller.
 */
export interface NewOffer {
  offerToken: string;
  bidToken: string;
  minPrice: bigint;
  minBidSize: bigint;
  totalSize: bigint;
}

export type OfferDetails = Pick<
  Offer,
  "seller" | "offerToken" | "bidToken" | "minPrice" | "minBidSize"
>;
