/**
 * Validation of untrusted bid payloads (JSON files, request bodies).
 *
 * uint256 fields accept decimal strings or safe integers; addresses are
 * returned checksummed. The signature is only checked to be hex bytes here:
 * whether it is a usable secp256k1 signature is decided at recovery.
 */

import { z } from "zod";
import { ethers } from "ethers";
import { InvalidParameterError } from "../utils/errors.js";
import type { Bid, UnsignedBid } from "../types/bid.js";

const uint256Schema = z
  .union([
    z.string().regex(/^\d+$/, "Expected a non-negative decimal integer"),
    z.number().int().nonnegative().refine(Number.isSafeInteger, "Unsafe integer, pass a string"),
    z.bigint().nonnegative(),
  ])
  .transform((v) => BigInt(v))
  .refine((v) => v <= ethers.MaxUint256, "Value exceeds uint256");

const addressSchema = z
  .string()
  .refine((v) => ethers.isAddress(v), "Invalid address")
  .transform((v) => ethers.getAddress(v));

const signatureSchema = z.string().regex(/^0x(?:[0-9a-fA-F]{2})*$/, "Signature must be 0x-prefixed hex bytes");

export const unsignedBidSchema = z.object({
  offerId: uint256Schema,
  bidId: uint256Schema,
  signerAddress: addressSchema,
  bidderAddress: addressSchema,
  bidToken: addressSchema,
  offerToken: addressSchema,
  bidAmount: uint256Schema,
  sellAmount: uint256Schema,
});

export const bidSchema = unsignedBidSchema.extend({
  signature: signatureSchema,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseBidData(input: unknown): Bid {
  const parsed = bidSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParameterError(`Invalid bid data: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseUnsignedBid(input: unknown): UnsignedBid {
  const parsed = unsignedBidSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParameterError(`Invalid bid data: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * JSON-safe form of a bid: bigint fields become decimal strings.
 */
export function serializeBidData(bid: Bid): Record<string, string> {
  return {
    offerId: bid.offerId.toString(),
    bidId: bid.bidId.toString(),
    signerAddress: bid.signerAddress,
    bidderAddress: bid.bidderAddress,
    bidToken: bid.bidToken,
    offerToken: bid.offerToken,
    bidAmount: bid.bidAmount.toString(),
    sellAmount: bid.sellAmount.toString(),
    signature: bid.signature,
  };
}
