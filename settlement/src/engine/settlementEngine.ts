/**
 * Settlement of a signed bid against an offer.
 *
 * Order of operations:
 * 1. Caller must be the offer's seller                      -> Unauthorized
 * 2. Bid must reference this offer, its tokens, >= minBidSize -> InconsistentOffer
 * 3. A signer other than the bidder must be its delegate     -> InvalidDelegate
 * 4. Consume the signer's nonce
 * 5. Recovered signer must equal signerAddress               -> InvalidSignature
 * 6. Both transfer legs inside one ledger transaction        -> TransferFailed
 * 7. Emit SettlementCompleted
 *
 * The nonce consumed in step 4 stays consumed when step 5 or 6 fails, so a
 * signed bid can be submitted at most once whatever the outcome. External
 * signers rely on this ordering.
 *
 * totalSize is not decremented: every bid is checked against the untouched
 * total, and the seller decides when to stop settling.
 */

import { KeyedLock } from "../utils/keyedLock.js";
import {
  InconsistentOfferError,
  InvalidDelegateError,
  InvalidSignatureError,
  RfqError,
  TransferFailedError,
  UnauthorizedError,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { EngineEvents } from "../utils/events.js";
import type { SignatureVerifier } from "../signing/signatureVerifier.js";
import type { NonceLedger } from "../store/nonceLedger.js";
import type { DelegationRegistry } from "../store/delegationRegistry.js";
import type { OfferStore } from "../store/offerStore.js";
import type { TokenLedger } from "../ledger/tokenLedger.js";
import type { Offer } from "../types/offer.js";
import type { Bid } from "../types/bid.js";

export interface SettlementEngineOptions {
  offers: OfferStore;
  nonces: NonceLedger;
  delegations: DelegationRegistry;
  verifier: SignatureVerifier;
  ledger: TokenLedger;
  events: EngineEvents;
  /** Engine address that sellers and bidders grant allowances to. */
  spender: string;
  logger: Logger;
}

export class SettlementEngine {
  private readonly offerLock = new KeyedLock();

  constructor(private readonly opts: SettlementEngineOptions) {}

  /**
   * Settle `bid` against offer `offerId` on behalf of `caller`. Addresses in
   * `bid` and `caller` must already be checksummed.
   */
  async settle(offerId: bigint, bid: Bid, caller: string): Promise<void> {
    const { logger } = this.opts;

    try {
      await this.offerLock.run(offerId.toString(), () => this.settleLocked(offerId, bid, caller));
    } catch (err) {
      if (err instanceof RfqError) {
        logger.warn(
          {
            offerId: offerId.toString(),
            bidId: bid.bidId.toString(),
            signer: bid.signerAddress,
            code: err.code,
            reason: err.message,
          },
          "Settlement rejected"
        );
      }
      throw err;
    }
  }

  private async settleLocked(offerId: bigint, bid: Bid, caller: string): Promise<void> {
    const { offers, nonces, delegations, verifier, events, logger } = this.opts;

    const offer = await offers.get(offerId);

    if (caller !== offer.seller) {
      throw new UnauthorizedError(`Caller ${caller} is not the seller of offer ${offerId}`);
    }

    assertConsistent(offerId, offer, bid);

    if (bid.bidderAddress !== bid.signerAddress) {
      const authorized = await delegations.isAuthorizedSigner(bid.bidderAddress, bid.signerAddress);
      if (!authorized) {
        throw new InvalidDelegateError(
          `${bid.signerAddress} is not a delegate of ${bid.bidderAddress}`
        );
      }
    }

    const nonce = await nonces.consume(bid.signerAddress);
    const digest = verifier.digestForBid(bid, nonce);
    const recovered = verifier.recoverSigner(digest, bid.signature);
    if (recovered !== bid.signerAddress) {
      throw new InvalidSignatureError(
        `Signature recovers to ${recovered}, expected ${bid.signerAddress} at nonce ${nonce}`
      );
    }

    await this.transfer(offer, bid);

    logger.info(
      {
        offerId: offerId.toString(),
        bidId: bid.bidId.toString(),
        seller: offer.seller,
        bidder: bid.bidderAddress,
        bidAmount: bid.bidAmount.toString(),
        sellAmount: bid.sellAmount.toString(),
        nonce: nonce.toString(),
      },
      "Bid settled"
    );

    events.emit("SettlementCompleted", {
      offerId,
      bidId: bid.bidId,
      offerToken: offer.offerToken,
      bidToken: offer.bidToken,
      seller: offer.seller,
      bidder: bid.bidderAddress,
      bidAmount: bid.bidAmount,
      sellAmount: bid.sellAmount,
    });
  }

  /**
   * offerToken leg (seller -> bidder) then bidToken leg (bidder -> seller).
   * A refused leg aborts the ledger transaction, undoing the other.
   */
  private async transfer(offer: Offer, bid: Bid): Promise<void> {
    const { ledger, spender } = this.opts;

    await ledger.transaction(async () => {
      const offerLeg = await ledger.transferFrom(
        offer.offerToken,
        spender,
        offer.seller,
        bid.bidderAddress,
        bid.bidAmount
      );
      if (!offerLeg) {
        throw new TransferFailedError(
          `Transfer of ${bid.bidAmount} ${offer.offerToken} from seller ${offer.seller} failed`
        );
      }

      const bidLeg = await ledger.transferFrom(
        offer.bidToken,
        spender,
        bid.bidderAddress,
        offer.seller,
        bid.sellAmount
      );
      if (!bidLeg) {
        throw new TransferFailedError(
          `Transfer of ${bid.sellAmount} ${offer.bidToken} from bidder ${bid.bidderAddress} failed`
        );
      }
    });
  }
}

function assertConsistent(offerId: bigint, offer: Offer, bid: Bid): void {
  if (bid.offerId !== offerId) {
    throw new InconsistentOfferError(`Bid targets offer ${bid.offerId}, not ${offerId}`);
  }
  if (bid.bidToken !== offer.bidToken) {
    throw new InconsistentOfferError(`Bid token ${bid.bidToken} does not match offer`);
  }
  if (bid.offerToken !== offer.offerToken) {
    throw new InconsistentOfferError(`Offer token ${bid.offerToken} does not match offer`);
  }
  if (bid.bidAmount < offer.minBidSize) {
    throw new InconsistentOfferError(
      `Bid amount ${bid.bidAmount} is below the minimum of ${offer.minBidSize}`
    );
  }
}
