/**
 * Typed-data digests and signer recovery for bids.
 *
 * The Bid type string and field order are the interoperability contract with
 * off-chain signers; any change invalidates every outstanding signature.
 *
 * One digest function serves both call sites. The read path passes the
 * signer's current nonce, settlement passes the nonce it just consumed, so a
 * bid digests identically in checkBid and settleOffer as long as no other
 * settlement for that signer happened in between.
 */

import { ethers } from "ethers";
import { InvalidSignatureError } from "../utils/errors.js";
import type { DomainContext } from "../domain/domainContext.js";
import type { UnsignedBid } from "../types/bid.js";

export type TypedFields = Record<string, ethers.TypedDataField[]>;

export const BID_TYPE_STRING =
  "Bid(uint256 offerId,uint256 bidId,address signerAddress,address bidderAddress,address bidToken,address offerToken,uint256 bidAmount,uint256 sellAmount,uint256 nonce)";
export const BID_TYPEHASH = ethers.id(BID_TYPE_STRING);

export const BID_TYPES: TypedFields = {
  Bid: [
    { name: "offerId", type: "uint256" },
    { name: "bidId", type: "uint256" },
    { name: "signerAddress", type: "address" },
    { name: "bidderAddress", type: "address" },
    { name: "bidToken", type: "address" },
    { name: "offerToken", type: "address" },
    { name: "bidAmount", type: "uint256" },
    { name: "sellAmount", type: "uint256" },
    { name: "nonce", type: "uint256" },
  ],
};

/**
 * The message a signer signs for a bid at a given nonce.
 */
export function bidMessage(bid: UnsignedBid, nonce: bigint): Record<string, bigint | string> {
  return {
    offerId: bid.offerId,
    bidId: bid.bidId,
    signerAddress: bid.signerAddress,
    bidderAddress: bid.bidderAddress,
    bidToken: bid.bidToken,
    offerToken: bid.offerToken,
    bidAmount: bid.bidAmount,
    sellAmount: bid.sellAmount,
    nonce,
  };
}

export class SignatureVerifier {
  constructor(private readonly context: DomainContext) {}

  get domainSeparator(): string {
    return this.context.domainSeparator;
  }

  hashStruct(
    primaryType: string,
    types: TypedFields,
    value: Record<string, unknown>
  ): string {
    return ethers.TypedDataEncoder.from(types).hashStruct(primaryType, value);
  }

  /**
   * keccak256("\x19\x01" || domainSeparator || hashStruct(value)) for any
   * typed payload under this domain.
   */
  digestFor(
    primaryType: string,
    types: TypedFields,
    value: Record<string, unknown>
  ): string {
    return ethers.keccak256(
      ethers.concat([
        "0x1901",
        this.context.domainSeparator,
        this.hashStruct(primaryType, types, value),
      ])
    );
  }

  digestForBid(bid: UnsignedBid, nonce: bigint): string {
    return this.digestFor("Bid", BID_TYPES, bidMessage(bid, nonce));
  }

  /**
   * Recover the address that produced `signature` over `digest`. The result
   * is not compared with anything here; callers check it against the claimed
   * signer.
   *
   * Only the 65-byte r ‖ s ‖ v form with v of 27 or 28 is accepted, the same
   * set an on-chain ecrecover verifier takes. Compact and EIP-155 style
   * encodings that ethers would otherwise normalize are rejected.
   */
  recoverSigner(digest: string, signature: string): string {
    try {
      const bytes = ethers.getBytes(signature);
      if (bytes.length !== 65) {
        throw new Error(`expected 65 bytes, got ${bytes.length}`);
      }
      const v = bytes[64];
      if (v !== 27 && v !== 28) {
        throw new Error(`invalid recovery id ${v}`);
      }
      return ethers.recoverAddress(digest, signature);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidSignatureError(`Malformed signature: ${reason}`);
    }
  }
}
