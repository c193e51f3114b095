/**
 * Bidder -> delegate signer mapping. At most one delegate per bidder; a new
 * delegation replaces the old one.
 */

import { ethers } from "ethers";
import { normalizeAddress } from "../utils/address.js";
import { InvalidParameterError } from "../utils/errors.js";
import type { EngineEvents } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";

export interface DelegationRepository {
  get(bidder: string): Promise<string | undefined>;
  set(bidder: string, signer: string): Promise<void>;
}

export class InMemoryDelegationRepository implements DelegationRepository {
  private readonly delegates = new Map<string, string>();

  async get(bidder: string): Promise<string | undefined> {
    return this.delegates.get(bidder);
  }

  async set(bidder: string, signer: string): Promise<void> {
    this.delegates.set(bidder, signer);
  }
}

export class DelegationRegistry {
  constructor(
    private readonly repository: DelegationRepository,
    private readonly events: EngineEvents,
    private readonly logger: Logger
  ) {}

  /**
   * Authorize `newSigner` to sign bids for `bidder`. Self-delegation and
   * repeating the current delegation are both accepted.
   */
  async delegate(bidder: string, newSigner: string): Promise<void> {
    const bidderKey = normalizeAddress(bidder, "bidder");
    const signerKey = normalizeAddress(newSigner, "newSigner");
    if (signerKey === ethers.ZeroAddress) {
      throw new InvalidParameterError("Delegate signer cannot be the zero address");
    }

    await this.repository.set(bidderKey, signerKey);
    this.logger.info({ bidder: bidderKey, newSigner: signerKey }, "Delegation changed");
    this.events.emit("DelegationChanged", { bidder: bidderKey, newSigner: signerKey });
  }

  async delegateOf(bidder: string): Promise<string | undefined> {
    return this.repository.get(normalizeAddress(bidder, "bidder"));
  }

  async isAuthorizedSigner(bidder: string, signer: string): Promise<boolean> {
    const bidderKey = normalizeAddress(bidder, "bidder");
    const signerKey = normalizeAddress(signer, "signer");
    if (bidderKey === signerKey) return true;
    return (await this.repository.get(bidderKey)) === signerKey;
  }
}
