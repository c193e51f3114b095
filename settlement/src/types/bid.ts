/**
 * Signed authorization to fill part of an offer. Never stored; it lives for
 * the duration of a check or settlement call.
 *
 * bidId is a caller-chosen correlation id and is not checked for uniqueness.
 */
export interface Bid {
  offerId: bigint;
  bidId: bigint;
  signerAddress: string;
  bidderAddress: string;
  bidToken: string;
  offerToken: string;
  bidAmount: bigint; // offerToken units the bidder receives
  sellAmount: bigint; // bidToken units the bidder pays
  signature: string;
}

export type UnsignedBid = Omit<Bid, "signature">;

/**
 * Violation codes in the order the validator evaluates them.
 */
export const BID_VIOLATIONS = [
  "SIGNATURE_MISMATCHED",
  "INVALID_SIGNER_FOR_BIDDER",
  "BID_TOO_SMALL",
  "BID_EXCEED_TOTAL_SIZE",
  "PRICE_TOO_LOW",
  "BIDDER_ALLOWANCE_LOW",
  "SELLER_ALLOWANCE_LOW",
] as const;

export type BidViolation = (typeof BID_VIOLATIONS)[number];

export interface BidCheckResult {
  errorCount: number;
  errors: BidViolation[];
}
