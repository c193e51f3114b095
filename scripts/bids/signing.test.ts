import { describe, it, expect } from "vitest";
import { ethers } from "ethers";
import { generatePrivateKey } from "viem/accounts";
import { isPrivateKey, parseNonce, signBidWithViem } from "./signing.js";
import {
  InMemoryTokenLedger,
  RfqEngine,
  SignatureVerifier,
  createDomainContext,
  createLogger,
  signBid,
  type UnsignedBid,
} from "../../settlement/src/index.js";

const DOMAIN = {
  name: "RFQ Settlement",
  version: "1",
  chainId: 31337n,
  verifyingContract: "0x9000000000000000000000000000000000000009",
};
const T1 = "0x1000000000000000000000000000000000000001";
const T2 = "0x2000000000000000000000000000000000000002";
const E18 = 10n ** 18n;
const E6 = 10n ** 6n;

const privateKey = generatePrivateKey();
const wallet = new ethers.Wallet(privateKey);

function unsignedBid(): UnsignedBid {
  return {
    offerId: 1n,
    bidId: 3n,
    signerAddress: wallet.address,
    bidderAddress: wallet.address,
    bidToken: T2,
    offerToken: T1,
    bidAmount: 2n * E18,
    sellAmount: 2500n * E6,
  };
}

describe("signBidWithViem", () => {
  it("produces the same signature as the ethers signer", async () => {
    const context = createDomainContext(DOMAIN);
    const viaViem = await signBidWithViem(privateKey, DOMAIN, unsignedBid(), 4n);
    const viaEthers = await signBid(wallet, context, unsignedBid(), 4n);

    expect(viaViem.signature).toBe(viaEthers.signature);
  });

  it("keeps chain ids beyond 2^53 exact", async () => {
    const wide = { ...DOMAIN, chainId: 2n ** 53n + 1n };
    const viaViem = await signBidWithViem(privateKey, wide, unsignedBid(), 0n);
    const verifier = new SignatureVerifier(createDomainContext(wide));

    expect(verifier.recoverSigner(verifier.digestForBid(viaViem, 0n), viaViem.signature)).toBe(
      wallet.address
    );
  });

  it("recovers to the signer through the engine's verifier", async () => {
    const verifier = new SignatureVerifier(createDomainContext(DOMAIN));
    const bid = await signBidWithViem(privateKey, DOMAIN, unsignedBid(), 0n);

    expect(verifier.recoverSigner(verifier.digestForBid(bid, 0n), bid.signature)).toBe(
      wallet.address
    );
  });

  it("signs a bid the engine settles", async () => {
    const seller = ethers.Wallet.createRandom();
    const ledger = new InMemoryTokenLedger();
    ledger.registerToken(T1, 18);
    ledger.registerToken(T2, 6);
    const engine = new RfqEngine({ domain: DOMAIN, ledger, logger: createLogger("silent") });

    const offerId = await engine.createOffer(seller.address, {
      offerToken: T1,
      bidToken: T2,
      minPrice: 1200n * E6,
      minBidSize: E18,
      totalSize: 5n * E18,
    });
    ledger.mint(T1, seller.address, 5n * E18);
    ledger.approve(T1, seller.address, engine.address, 5n * E18);
    ledger.mint(T2, wallet.address, 2500n * E6);
    ledger.approve(T2, wallet.address, engine.address, 2500n * E6);

    const bid = await signBidWithViem(privateKey, DOMAIN, { ...unsignedBid(), offerId }, 0n);
    expect(await engine.checkBid(bid)).toEqual({ errorCount: 0, errors: [] });

    await engine.settleOffer(seller.address, offerId, bid);

    expect(ledger.balanceOf(T1, wallet.address)).toBe(2n * E18);
    expect(ledger.balanceOf(T2, seller.address)).toBe(2500n * E6);
    expect(await engine.nonces(wallet.address)).toBe(1n);
  });
});

describe("isPrivateKey", () => {
  it("accepts 32 bytes of hex", () => {
    expect(isPrivateKey(privateKey)).toBe(true);
  });

  it("rejects a key without the 0x prefix", () => {
    expect(isPrivateKey(privateKey.slice(2))).toBe(false);
  });

  it("rejects a short key", () => {
    expect(isPrivateKey("0x1234")).toBe(false);
  });
});

describe("parseNonce", () => {
  it("parses a decimal nonce", () => {
    expect(parseNonce("12")).toBe(12n);
  });

  it("rejects a negative nonce", () => {
    expect(() => parseNonce("-1")).toThrow("Nonce must be a non-negative integer, got: -1");
  });
});
