/**
 * RFQ settlement engine.
 *
 * Flow:
 * 1. Seller posts an offer (createOffer)
 * 2. Bidder, or a delegate it registered with delegateToSigner, signs an
 *    EIP-712 Bid off-chain at its current nonce
 * 3. Anyone can simulate the bid with checkBid / getBidSigner
 * 4. Seller submits the signed bid with settleOffer: the engine consumes the
 *    signer's nonce, verifies the signature and runs both transfer legs
 *    atomically through the TokenLedger
 */

export { RfqEngine, type RfqEngineOptions } from "./engine/rfqEngine.js";
export { SettlementEngine, type SettlementEngineOptions } from "./engine/settlementEngine.js";
export {
  BidValidator,
  ViolationList,
  computePrice,
  MAX_VIOLATIONS,
  type BidValidatorOptions,
} from "./engine/bidValidator.js";
export {
  createDomainContext,
  EIP712_DOMAIN_TYPE,
  EIP712_DOMAIN_TYPEHASH,
  type DomainContext,
  type DomainParams,
} from "./domain/domainContext.js";
export {
  SignatureVerifier,
  BID_TYPES,
  BID_TYPE_STRING,
  BID_TYPEHASH,
  bidMessage,
  type TypedFields,
} from "./signing/signatureVerifier.js";
export { signBid } from "./signing/bidSigner.js";
export { NonceLedger, InMemoryNonceRepository, type NonceRepository } from "./store/nonceLedger.js";
export {
  DelegationRegistry,
  InMemoryDelegationRepository,
  type DelegationRepository,
} from "./store/delegationRegistry.js";
export { OfferStore, InMemoryOfferRepository, type OfferRepository } from "./store/offerStore.js";
export type { TokenLedger } from "./ledger/tokenLedger.js";
export { InMemoryTokenLedger } from "./ledger/memoryLedger.js";
export { parseBidData, parseUnsignedBid, serializeBidData } from "./codec/bidData.js";
export { createLogger, type Logger } from "./utils/logger.js";
export { EngineEvents } from "./utils/events.js";
export * from "./utils/errors.js";
export { BID_VIOLATIONS, type Bid, type UnsignedBid, type BidViolation, type BidCheckResult } from "./types/bid.js";
export type { Offer, NewOffer, OfferDetails } from "./types/offer.js";
export type {
  EngineEventMap,
  OfferCreatedEvent,
  DelegationChangedEvent,
  SettlementCompletedEvent,
} from "./types/events.js";
export type { EngineConfig } from "./types/config.js";
