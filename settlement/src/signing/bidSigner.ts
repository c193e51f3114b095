import type { ethers } from "ethers";
import { BID_TYPES, bidMessage } from "./signatureVerifier.js";
import type { DomainContext } from "../domain/domainContext.js";
import type { Bid, UnsignedBid } from "../types/bid.js";

/**
 * Sign a bid at `nonce` with an ethers signer. The nonce must be the signer's
 * current value on the engine for the bid to settle.
 */
export async function signBid(
  signer: ethers.Signer,
  context: DomainContext,
  bid: UnsignedBid,
  nonce: bigint
): Promise<Bid> {
  const signature = await signer.signTypedData(
    {
      name: context.domain.name,
      version: context.domain.version,
      chainId: context.domain.chainId,
      verifyingContract: context.domain.verifyingContract,
    },
    BID_TYPES,
    bidMessage(bid, nonce)
  );
  return { ...bid, signature };
}
