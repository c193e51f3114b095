/**
 * Bidder-side signing with viem.
 *
 * The engine verifies with ethers; signing here goes through viem's own
 * EIP-712 encoder, so a bid produced by this module and accepted by the
 * engine shows both encoders agree on the Bid layout.
 */

import { getAddress, type Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Bid, DomainParams, UnsignedBid } from "../../settlement/src/index.js";

export const BID_TYPED_DATA_TYPES = {
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
} as const;

export function isPrivateKey(value: string): value is Hex {
  return /^0x[0-9a-fA-F]{64}$/.test(value);
}

export function parseNonce(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Nonce must be a non-negative integer, got: ${value}`);
  }
  return BigInt(value);
}

export async function signBidWithViem(
  privateKey: Hex,
  domain: DomainParams,
  bid: UnsignedBid,
  nonce: bigint
): Promise<Bid> {
  const account = privateKeyToAccount(privateKey);
  const signature = await account.signTypedData({
    domain: {
      name: domain.name,
      version: domain.version,
      chainId: domain.chainId,
      verifyingContract: getAddress(domain.verifyingContract),
    },
    types: BID_TYPED_DATA_TYPES,
    primaryType: "Bid",
    message: {
      offerId: bid.offerId,
      bidId: bid.bidId,
      signerAddress: getAddress(bid.signerAddress),
      bidderAddress: getAddress(bid.bidderAddress),
      bidToken: getAddress(bid.bidToken),
      offerToken: getAddress(bid.offerToken),
      bidAmount: bid.bidAmount,
      sellAmount: bid.sellAmount,
      nonce,
    },
  });
  return { ...bid, signature };
}
