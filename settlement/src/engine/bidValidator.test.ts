import { describe, it, expect } from "vitest";
import { ethers } from "ethers";
import { BidValidator, ViolationList, computePrice, MAX_VIOLATIONS } from "./bidValidator.js";
import { createDomainContext } from "../domain/domainContext.js";
import { SignatureVerifier } from "../signing/signatureVerifier.js";
import { signBid } from "../signing/bidSigner.js";
import { NonceLedger, InMemoryNonceRepository } from "../store/nonceLedger.js";
import { DelegationRegistry, InMemoryDelegationRepository } from "../store/delegationRegistry.js";
import { InMemoryTokenLedger } from "../ledger/memoryLedger.js";
import { EngineEvents } from "../utils/events.js";
import { createLogger } from "../utils/logger.js";
import { ViolationCapacityError } from "../utils/errors.js";
import { BID_VIOLATIONS, type UnsignedBid } from "../types/bid.js";
import type { Offer } from "../types/offer.js";

const ENGINE = "0x9000000000000000000000000000000000000009";
const T1 = "0x1000000000000000000000000000000000000001";
const T2 = "0x2000000000000000000000000000000000000002";
const E18 = 10n ** 18n;
const E6 = 10n ** 6n;

const seller = ethers.Wallet.createRandom();
const bidder = ethers.Wallet.createRandom();
const delegate = ethers.Wallet.createRandom();
const stranger = ethers.Wallet.createRandom();

const offer: Offer = {
  id: 1n,
  seller: seller.address,
  offerToken: T1,
  bidToken: T2,
  minPrice: 1000n * E6,
  minBidSize: E18,
  totalSize: 10n * E18,
  offerTokenDecimals: 18,
};

const unsigned: UnsignedBid = {
  offerId: 1n,
  bidId: 1n,
  signerAddress: bidder.address,
  bidderAddress: bidder.address,
  bidToken: T2,
  offerToken: T1,
  bidAmount: 10n * E18,
  sellAmount: 10000n * E6,
};

function setup(opts: { approve?: boolean } = {}) {
  const logger = createLogger("silent");
  const context = createDomainContext({
    name: "RFQ Settlement",
    version: "1",
    chainId: 31337n,
    verifyingContract: ENGINE,
  });
  const nonces = new NonceLedger(new InMemoryNonceRepository(), logger);
  const delegations = new DelegationRegistry(
    new InMemoryDelegationRepository(),
    new EngineEvents(logger),
    logger
  );
  const ledger = new InMemoryTokenLedger();
  if (opts.approve ?? true) {
    ledger.approve(T2, bidder.address, ENGINE, 10000n * E6);
    ledger.approve(T1, seller.address, ENGINE, 10n * E18);
  }
  const validator = new BidValidator({
    verifier: new SignatureVerifier(context),
    nonces,
    delegations,
    ledger,
    spender: ENGINE,
  });
  return { context, nonces, delegations, ledger, validator };
}

describe("computePrice", () => {
  it("scales by offer token decimals", () => {
    // 10000e6 * 10^18 / 10e18 = 1000e6
    expect(computePrice(10000n * E6, 10n * E18, 18)).toBe(1000n * E6);
  });

  it("truncates toward zero", () => {
    expect(computePrice(10n, 3n, 0)).toBe(3n);
    expect(computePrice(2n, 3n, 0)).toBe(0n);
  });

  it("has no price for a zero bid amount", () => {
    expect(computePrice(100n, 0n, 18)).toBeUndefined();
  });
});

describe("ViolationList", () => {
  it("keeps insertion order", () => {
    const list = new ViolationList();
    list.push("PRICE_TOO_LOW");
    list.push("BID_TOO_SMALL");
    expect(list.toResult()).toEqual({ errorCount: 2, errors: ["PRICE_TOO_LOW", "BID_TOO_SMALL"] });
  });

  it("throws instead of truncating past capacity", () => {
    const list = new ViolationList(2);
    list.push("SIGNATURE_MISMATCHED");
    list.push("BID_TOO_SMALL");
    expect(() => list.push("PRICE_TOO_LOW")).toThrow(ViolationCapacityError);
    expect(list.count).toBe(2);
  });

  it("has room for every defined check", () => {
    expect(MAX_VIOLATIONS).toBe(BID_VIOLATIONS.length);
  });
});

describe("BidValidator", () => {
  it("passes a bid exactly at the minimum price", async () => {
    const { context, validator } = setup();
    const bid = await signBid(bidder, context, unsigned, 0n);

    expect(await validator.check(offer, bid)).toEqual({ errorCount: 0, errors: [] });
  });

  it("reports violations in check order", async () => {
    const { context, validator } = setup();
    // 100e6 * 10^18 / 5e17 = 200e6 < 1000e6
    const bid = await signBid(
      stranger,
      context,
      { ...unsigned, bidAmount: 5n * 10n ** 17n, sellAmount: 100n * E6 },
      0n
    );

    expect(await validator.check(offer, bid)).toEqual({
      errorCount: 3,
      errors: ["SIGNATURE_MISMATCHED", "BID_TOO_SMALL", "PRICE_TOO_LOW"],
    });
  });

  it("reports all seven violations at once", async () => {
    const { context, validator } = setup({ approve: false });
    const tangled: Offer = { ...offer, minBidSize: 20n * E18, totalSize: 10n * E18 };
    const bid = await signBid(
      stranger,
      context,
      {
        ...unsigned,
        signerAddress: delegate.address,
        bidAmount: 15n * E18,
        sellAmount: 1n,
      },
      0n
    );

    const result = await validator.check(tangled, bid);
    expect(result.errorCount).toBe(7);
    expect(result.errors).toEqual([...BID_VIOLATIONS]);
  });

  it("flags a price one unit below the minimum", async () => {
    const { context, validator } = setup();
    // (10000e6 - 1) * 10^18 / 10e18 truncates to 1000e6 - 1
    const bid = await signBid(bidder, context, { ...unsigned, sellAmount: 10000n * E6 - 1n }, 0n);

    expect((await validator.check(offer, bid)).errors).toEqual(["PRICE_TOO_LOW"]);
  });

  it("flags a bid above the total size", async () => {
    const { context, ledger, validator } = setup();
    ledger.approve(T1, seller.address, ENGINE, 11n * E18);
    ledger.approve(T2, bidder.address, ENGINE, 11000n * E6);
    const bid = await signBid(
      bidder,
      context,
      { ...unsigned, bidAmount: 11n * E18, sellAmount: 11000n * E6 },
      0n
    );

    expect((await validator.check(offer, bid)).errors).toEqual(["BID_EXCEED_TOTAL_SIZE"]);
  });

  it("treats a zero bid amount as too small and unpriced", async () => {
    const { context, validator } = setup();
    const bid = await signBid(bidder, context, { ...unsigned, bidAmount: 0n }, 0n);

    expect((await validator.check(offer, bid)).errors).toEqual(["BID_TOO_SMALL", "PRICE_TOO_LOW"]);
  });

  it("reports low allowances on both sides", async () => {
    const { context, validator } = setup({ approve: false });
    const bid = await signBid(bidder, context, unsigned, 0n);

    expect((await validator.check(offer, bid)).errors).toEqual([
      "BIDDER_ALLOWANCE_LOW",
      "SELLER_ALLOWANCE_LOW",
    ]);
  });

  it("accepts a registered delegate", async () => {
    const { context, delegations, validator } = setup();
    await delegations.delegate(bidder.address, delegate.address);
    const bid = await signBid(delegate, context, { ...unsigned, signerAddress: delegate.address }, 0n);

    expect((await validator.check(offer, bid)).errors).toEqual([]);
  });

  it("flags an unregistered delegate even with a valid signature", async () => {
    const { context, validator } = setup();
    const bid = await signBid(delegate, context, { ...unsigned, signerAddress: delegate.address }, 0n);

    expect((await validator.check(offer, bid)).errors).toEqual(["INVALID_SIGNER_FOR_BIDDER"]);
  });

  it("checks the signature against the current nonce", async () => {
    const { context, nonces, validator } = setup();
    const bid = await signBid(bidder, context, unsigned, 0n);
    await nonces.consume(bidder.address);

    expect((await validator.check(offer, bid)).errors).toEqual(["SIGNATURE_MISMATCHED"]);
  });

  it("reports a malformed signature as a mismatch", async () => {
    const { validator } = setup();
    const result = await validator.check(offer, { ...unsigned, signature: "0xdeadbeef" });
    expect(result.errors).toEqual(["SIGNATURE_MISMATCHED"]);
  });

  it("has no side effects", async () => {
    const { context, nonces, ledger, validator } = setup();
    const bid = await signBid(bidder, context, unsigned, 0n);

    const first = await validator.check(offer, bid);
    const second = await validator.check(offer, bid);

    expect(second).toEqual(first);
    expect(await nonces.current(bidder.address)).toBe(0n);
    expect(await ledger.allowance(T2, bidder.address, ENGINE)).toBe(10000n * E6);
  });
});
