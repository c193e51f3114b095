/**
 * Per-signer replay-protection counters.
 *
 * A nonce value is embedded in exactly one digest: consume() hands out the
 * current value and advances the counter, so a signature over a consumed
 * nonce can never verify again.
 */

import { KeyedLock } from "../utils/keyedLock.js";
import { normalizeAddress } from "../utils/address.js";
import type { Logger } from "../utils/logger.js";

export interface NonceRepository {
  get(signer: string): Promise<bigint>;
  /** Atomically add 1 and return the value before the increment. */
  increment(signer: string): Promise<bigint>;
}

export class InMemoryNonceRepository implements NonceRepository {
  private readonly counters = new Map<string, bigint>();

  async get(signer: string): Promise<bigint> {
    return this.counters.get(signer) ?? 0n;
  }

  async increment(signer: string): Promise<bigint> {
    const previous = this.counters.get(signer) ?? 0n;
    this.counters.set(signer, previous + 1n);
    return previous;
  }
}

export class NonceLedger {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly repository: NonceRepository,
    private readonly logger: Logger
  ) {}

  /**
   * Current counter for `signer` (0 if never consumed). No side effects.
   */
  async current(signer: string): Promise<bigint> {
    return this.repository.get(normalizeAddress(signer, "signer"));
  }

  /**
   * Return the current counter and advance it by one. Consumers of the same
   * signer are serialized, so no two callers observe the same value.
   */
  async consume(signer: string): Promise<bigint> {
    const key = normalizeAddress(signer, "signer");
    return this.lock.run(key, async () => {
      const nonce = await this.repository.increment(key);
      this.logger.debug({ signer: key, nonce: nonce.toString() }, "Nonce consumed");
      return nonce;
    });
  }
}
