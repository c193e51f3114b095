import type { Offer } from "./offer.js";

export type OfferCreatedEvent = Offer;

export interface DelegationChangedEvent {
  bidder: string;
  newSigner: string;
}

export interface SettlementCompletedEvent {
  offerId: bigint;
  bidId: bigint;
  offerToken: string;
  bidToken: string;
  seller: string;
  bidder: string;
  bidAmount: bigint;
  sellAmount: bigint;
}

export interface EngineEventMap {
  OfferCreated: OfferCreatedEvent;
  DelegationChanged: DelegationChangedEvent;
  SettlementCompleted: SettlementCompletedEvent;
}
