/**
 * Read-only bid simulation. Runs every check in a fixed order and reports
 * all failures instead of stopping at the first; consumes no nonce and
 * mutates nothing.
 *
 * Check order (matches BID_VIOLATIONS):
 * 1. SIGNATURE_MISMATCHED       recovered signer (current nonce) != signerAddress
 * 2. INVALID_SIGNER_FOR_BIDDER  signer is neither the bidder nor its delegate
 * 3. BID_TOO_SMALL              bidAmount < minBidSize
 * 4. BID_EXCEED_TOTAL_SIZE      bidAmount > totalSize
 * 5. PRICE_TOO_LOW              sellAmount * 10^decimals / bidAmount < minPrice
 * 6. BIDDER_ALLOWANCE_LOW       bidder's bidToken allowance to the engine < sellAmount
 * 7. SELLER_ALLOWANCE_LOW       seller's offerToken allowance to the engine < bidAmount
 */

import { InvalidSignatureError, ViolationCapacityError } from "../utils/errors.js";
import type { SignatureVerifier } from "../signing/signatureVerifier.js";
import type { NonceLedger } from "../store/nonceLedger.js";
import type { DelegationRegistry } from "../store/delegationRegistry.js";
import type { TokenLedger } from "../ledger/tokenLedger.js";
import type { Offer } from "../types/offer.js";
import type { Bid, BidCheckResult, BidViolation } from "../types/bid.js";

export const MAX_VIOLATIONS = 7;

/**
 * Ordered violation list with a hard capacity. Overflowing is a programming
 * error (a check was added without raising the cap) and throws.
 */
export class ViolationList {
  private readonly items: BidViolation[] = [];

  constructor(private readonly capacity: number = MAX_VIOLATIONS) {}

  push(code: BidViolation): void {
    if (this.items.length >= this.capacity) {
      throw new ViolationCapacityError(
        `Violation list full (${this.capacity}), cannot record ${code}`
      );
    }
    this.items.push(code);
  }

  get count(): number {
    return this.items.length;
  }

  toResult(): BidCheckResult {
    return { errorCount: this.items.length, errors: [...this.items] };
  }
}

/**
 * Price of one whole offerToken in bidToken base units, truncated toward
 * zero. Returns undefined for a zero bidAmount, which has no price.
 */
export function computePrice(
  sellAmount: bigint,
  bidAmount: bigint,
  offerTokenDecimals: number
): bigint | undefined {
  if (bidAmount === 0n) return undefined;
  return (sellAmount * 10n ** BigInt(offerTokenDecimals)) / bidAmount;
}

export interface BidValidatorOptions {
  verifier: SignatureVerifier;
  nonces: NonceLedger;
  delegations: DelegationRegistry;
  ledger: TokenLedger;
  /** Address the ledger allowances must be granted to. */
  spender: string;
}

export class BidValidator {
  constructor(private readonly opts: BidValidatorOptions) {}

  async check(offer: Offer, bid: Bid): Promise<BidCheckResult> {
    const { verifier, nonces, delegations, ledger, spender } = this.opts;
    const violations = new ViolationList();

    const nonce = await nonces.current(bid.signerAddress);
    if (!(await this.signatureMatches(bid, nonce))) {
      violations.push("SIGNATURE_MISMATCHED");
    }

    if (!(await delegations.isAuthorizedSigner(bid.bidderAddress, bid.signerAddress))) {
      violations.push("INVALID_SIGNER_FOR_BIDDER");
    }

    if (bid.bidAmount < offer.minBidSize) {
      violations.push("BID_TOO_SMALL");
    }

    if (bid.bidAmount > offer.totalSize) {
      violations.push("BID_EXCEED_TOTAL_SIZE");
    }

    const price = computePrice(bid.sellAmount, bid.bidAmount, offer.offerTokenDecimals);
    if (price === undefined || price < offer.minPrice) {
      violations.push("PRICE_TOO_LOW");
    }

    const bidderAllowance = await ledger.allowance(offer.bidToken, bid.bidderAddress, spender);
    if (bidderAllowance < bid.sellAmount) {
      violations.push("BIDDER_ALLOWANCE_LOW");
    }

    const sellerAllowance = await ledger.allowance(offer.offerToken, offer.seller, spender);
    if (sellerAllowance < bid.bidAmount) {
      violations.push("SELLER_ALLOWANCE_LOW");
    }

    return violations.toResult();
  }

  private async signatureMatches(bid: Bid, nonce: bigint): Promise<boolean> {
    const digest = this.opts.verifier.digestForBid(bid, nonce);
    try {
      return this.opts.verifier.recoverSigner(digest, bid.signature) === bid.signerAddress;
    } catch (err) {
      // A malformed signature is a mismatch here; only settlement hard-fails on it
      if (err instanceof InvalidSignatureError) return false;
      throw err;
    }
  }
}
