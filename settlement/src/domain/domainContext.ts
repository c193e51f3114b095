/**
 * EIP-712 domain binding every bid signature to one protocol name, version,
 * chain and verifying contract.
 *
 * domainSeparator = keccak256(abi.encode(
 *   EIP712_DOMAIN_TYPEHASH, keccak256(name), keccak256(version), chainId, verifyingContract))
 */

import { ethers } from "ethers";
import { normalizeAddress } from "../utils/address.js";

export const EIP712_DOMAIN_TYPE =
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)";
export const EIP712_DOMAIN_TYPEHASH = ethers.id(EIP712_DOMAIN_TYPE);

export interface DomainParams {
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: string;
}

export interface DomainContext {
  readonly domain: Readonly<DomainParams>;
  readonly domainSeparator: string;
}

/**
 * Build the domain context. The separator is derived once here and the
 * returned object is frozen.
 */
export function createDomainContext(params: DomainParams): DomainContext {
  const domain: DomainParams = Object.freeze({
    name: params.name,
    version: params.version,
    chainId: params.chainId,
    verifyingContract: normalizeAddress(params.verifyingContract, "verifyingContract"),
  });

  return Object.freeze({
    domain,
    domainSeparator: ethers.TypedDataEncoder.hashDomain(domain),
  });
}
