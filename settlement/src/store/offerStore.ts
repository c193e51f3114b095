/**
 * Offer records, keyed by dense sequential ids starting at 1. Records are
 * frozen on creation; settlement never decrements totalSize.
 */

import { normalizeAddress } from "../utils/address.js";
import { InvalidParameterError, NotFoundError } from "../utils/errors.js";
import type { EngineEvents } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";
import type { Offer } from "../types/offer.js";

export interface OfferRepository {
  /** Assign the next id and store the record. */
  insert(fields: Omit<Offer, "id">): Promise<Offer>;
  get(offerId: bigint): Promise<Offer | undefined>;
}

export class InMemoryOfferRepository implements OfferRepository {
  private readonly offers = new Map<bigint, Offer>();
  private lastId = 0n;

  async insert(fields: Omit<Offer, "id">): Promise<Offer> {
    this.lastId += 1n;
    const offer: Offer = Object.freeze({ id: this.lastId, ...fields });
    this.offers.set(offer.id, offer);
    return offer;
  }

  async get(offerId: bigint): Promise<Offer | undefined> {
    return this.offers.get(offerId);
  }
}

export class OfferStore {
  constructor(
    private readonly repository: OfferRepository,
    private readonly events: EngineEvents,
    private readonly logger: Logger
  ) {}

  async create(
    seller: string,
    offerToken: string,
    bidToken: string,
    minPrice: bigint,
    minBidSize: bigint,
    totalSize: bigint,
    offerTokenDecimals: number
  ): Promise<bigint> {
    if (minPrice <= 0n) {
      throw new InvalidParameterError("minPrice must be greater than zero");
    }
    if (minBidSize <= 0n) {
      throw new InvalidParameterError("minBidSize must be greater than zero");
    }
    if (totalSize < 0n) {
      throw new InvalidParameterError("totalSize cannot be negative");
    }

    const offer = await this.repository.insert({
      seller: normalizeAddress(seller, "seller"),
      offerToken: normalizeAddress(offerToken, "offerToken"),
      bidToken: normalizeAddress(bidToken, "bidToken"),
      minPrice,
      minBidSize,
      totalSize,
      offerTokenDecimals,
    });

    this.logger.info(
      {
        offerId: offer.id.toString(),
        seller: offer.seller,
        offerToken: offer.offerToken,
        bidToken: offer.bidToken,
        minPrice: minPrice.toString(),
        minBidSize: minBidSize.toString(),
        totalSize: totalSize.toString(),
      },
      "Offer created"
    );
    this.events.emit("OfferCreated", offer);

    return offer.id;
  }

  async get(offerId: bigint): Promise<Offer> {
    const offer = await this.repository.get(offerId);
    if (!offer) {
      throw new NotFoundError(`Offer ${offerId} does not exist`);
    }
    return offer;
  }
}
