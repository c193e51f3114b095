/**
 * Public surface of the settlement engine. Wires the domain, stores,
 * verifier, validator and settlement together and exposes the operations
 * callers use. Every mutating operation takes the caller's address
 * explicitly; the transport that authenticates it lives outside this package.
 */

import { createDomainContext, type DomainParams } from "../domain/domainContext.js";
import { SignatureVerifier } from "../signing/signatureVerifier.js";
import { InMemoryNonceRepository, NonceLedger, type NonceRepository } from "../store/nonceLedger.js";
import {
  DelegationRegistry,
  InMemoryDelegationRepository,
  type DelegationRepository,
} from "../store/delegationRegistry.js";
import { InMemoryOfferRepository, OfferStore, type OfferRepository } from "../store/offerStore.js";
import { BidValidator } from "./bidValidator.js";
import { SettlementEngine } from "./settlementEngine.js";
import { EngineEvents } from "../utils/events.js";
import { normalizeAddress, normalizeBid } from "../utils/address.js";
import type { TokenLedger } from "../ledger/tokenLedger.js";
import type { Logger } from "../utils/logger.js";
import type { Bid, BidCheckResult } from "../types/bid.js";
import type { NewOffer, Offer, OfferDetails } from "../types/offer.js";
import type { EngineEventMap } from "../types/events.js";

export interface RfqEngineOptions {
  domain: DomainParams;
  ledger: TokenLedger;
  logger: Logger;
  repositories?: {
    offers?: OfferRepository;
    nonces?: NonceRepository;
    delegations?: DelegationRepository;
  };
}

export class RfqEngine {
  private readonly events: EngineEvents;
  private readonly verifier: SignatureVerifier;
  private readonly offers: OfferStore;
  private readonly nonceLedger: NonceLedger;
  private readonly delegations: DelegationRegistry;
  private readonly validator: BidValidator;
  private readonly settlement: SettlementEngine;
  private readonly ledger: TokenLedger;
  private readonly logger: Logger;

  /** Address allowances must be granted to: the domain's verifying contract. */
  readonly address: string;

  constructor(opts: RfqEngineOptions) {
    const context = createDomainContext(opts.domain);
    const repos = opts.repositories ?? {};

    this.events = new EngineEvents(opts.logger);
    this.address = context.domain.verifyingContract;
    this.ledger = opts.ledger;
    this.logger = opts.logger;
    this.verifier = new SignatureVerifier(context);
    this.offers = new OfferStore(repos.offers ?? new InMemoryOfferRepository(), this.events, opts.logger);
    this.nonceLedger = new NonceLedger(repos.nonces ?? new InMemoryNonceRepository(), opts.logger);
    this.delegations = new DelegationRegistry(
      repos.delegations ?? new InMemoryDelegationRepository(),
      this.events,
      opts.logger
    );
    this.validator = new BidValidator({
      verifier: this.verifier,
      nonces: this.nonceLedger,
      delegations: this.delegations,
      ledger: opts.ledger,
      spender: this.address,
    });
    this.settlement = new SettlementEngine({
      offers: this.offers,
      nonces: this.nonceLedger,
      delegations: this.delegations,
      verifier: this.verifier,
      ledger: opts.ledger,
      events: this.events,
      spender: this.address,
      logger: opts.logger,
    });

    opts.logger.info(
      {
        name: context.domain.name,
        version: context.domain.version,
        chainId: context.domain.chainId.toString(),
        verifyingContract: context.domain.verifyingContract,
        domainSeparator: context.domainSeparator,
      },
      "RFQ engine initialized"
    );
  }

  get domainSeparator(): string {
    return this.verifier.domainSeparator;
  }

  on<K extends keyof EngineEventMap>(
    event: K,
    listener: (payload: EngineEventMap[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  /**
   * Post an offer with `caller` as seller. Returns the new offer id.
   */
  async createOffer(caller: string, params: NewOffer): Promise<bigint> {
    const offerTokenDecimals = await this.ledger.decimals(params.offerToken);
    return this.offers.create(
      caller,
      params.offerToken,
      params.bidToken,
      params.minPrice,
      params.minBidSize,
      params.totalSize,
      offerTokenDecimals
    );
  }

  async delegateToSigner(caller: string, newSigner: string): Promise<void> {
    await this.delegations.delegate(caller, newSigner);
  }

  async settleOffer(caller: string, offerId: bigint, bid: Bid): Promise<void> {
    await this.settlement.settle(offerId, normalizeBid(bid), normalizeAddress(caller, "caller"));
  }

  /**
   * Simulate a bid against its offer. Never throws for rule violations;
   * an empty list means the bid passes every known check right now, not
   * that settlement will succeed later.
   */
  async checkBid(bid: Bid): Promise<BidCheckResult> {
    const normalized = normalizeBid(bid);
    const offer = await this.offers.get(normalized.offerId);
    const result = await this.validator.check(offer, normalized);
    this.logger.debug(
      { offerId: offer.id.toString(), bidId: normalized.bidId.toString(), errors: result.errors },
      "Bid checked"
    );
    return result;
  }

  /**
   * Address recovered from the bid's signature at the signer's current nonce.
   */
  async getBidSigner(bid: Bid): Promise<string> {
    const normalized = normalizeBid(bid);
    const nonce = await this.nonceLedger.current(normalized.signerAddress);
    return this.verifier.recoverSigner(
      this.verifier.digestForBid(normalized, nonce),
      normalized.signature
    );
  }

  async nonces(identity: string): Promise<bigint> {
    return this.nonceLedger.current(identity);
  }

  async delegateOf(bidder: string): Promise<string | undefined> {
    return this.delegations.delegateOf(bidder);
  }

  async getOfferDetails(offerId: bigint): Promise<OfferDetails> {
    const { seller, offerToken, bidToken, minPrice, minBidSize } = await this.offers.get(offerId);
    return { seller, offerToken, bidToken, minPrice, minBidSize };
  }

  async getOffer(offerId: bigint): Promise<Offer> {
    return this.offers.get(offerId);
  }
}
