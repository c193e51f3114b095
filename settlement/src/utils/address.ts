import { ethers } from "ethers";
import { InvalidParameterError } from "./errors.js";
import type { Bid } from "../types/bid.js";

/**
 * Checksum an address, rejecting anything that is not a 20-byte hex address.
 * Every identity is stored and compared in this form.
 */
export function normalizeAddress(value: string, field: string = "address"): string {
  if (!ethers.isAddress(value)) {
    throw new InvalidParameterError(`Invalid ${field}: ${value}`);
  }
  return ethers.getAddress(value);
}

export function normalizeBid(bid: Bid): Bid {
  return {
    ...bid,
    signerAddress: normalizeAddress(bid.signerAddress, "signerAddress"),
    bidderAddress: normalizeAddress(bid.bidderAddress, "bidderAddress"),
    bidToken: normalizeAddress(bid.bidToken, "bidToken"),
    offerToken: normalizeAddress(bid.offerToken, "offerToken"),
  };
}
