#!/usr/bin/env npx tsx
/**
 * Bid signing CLI
 *
 * Off-chain helper for bidders and sellers:
 * - Print the domain separator the engine verifies against
 * - Compute a bid digest at a given nonce
 * - Sign a bid with a private key
 * - Recover the signer of a signed bid
 *
 * Domain parameters come from the same RFQ_* environment variables as the
 * engine (see .env.example).
 *
 * Usage:
 *   npx tsx scripts/bids/cli.ts domain-separator
 *   npx tsx scripts/bids/cli.ts digest <bid.json> --nonce <n>
 *   npx tsx scripts/bids/cli.ts sign-bid <bid.json> --private-key <hex> --nonce <n> [--output <path>]
 *   npx tsx scripts/bids/cli.ts recover-signer <bid.json> --nonce <n>
 */

import { Command } from "commander";
import * as fs from "node:fs";
import { loadConfig } from "../../settlement/src/config.js";
import {
  SignatureVerifier,
  createDomainContext,
  parseBidData,
  parseUnsignedBid,
  serializeBidData,
} from "../../settlement/src/index.js";
import { isPrivateKey, parseNonce, signBidWithViem } from "./signing.js";

function readJson(path: string): unknown {
  return JSON.parse(fs.readFileSync(path, "utf-8"));
}

function verifierFromEnv(): SignatureVerifier {
  return new SignatureVerifier(createDomainContext(loadConfig().domain));
}

// ============ CLI Setup ============

const program = new Command();

program
  .name("rfq-bids")
  .description("Sign and inspect EIP-712 bids for the RFQ settlement engine")
  .version("0.1.0");

program
  .command("domain-separator")
  .description("Print the EIP-712 domain separator for the configured domain")
  .action(() => {
    const { domain } = loadConfig();
    const context = createDomainContext(domain);
    console.log(`Name:              ${domain.name}`);
    console.log(`Version:           ${domain.version}`);
    console.log(`Chain ID:          ${domain.chainId}`);
    console.log(`Verifying contract: ${domain.verifyingContract}`);
    console.log(`Domain separator:  ${context.domainSeparator}`);
  });

program
  .command("digest")
  .description("Compute the typed-data digest of a bid at a nonce")
  .argument("<bid-file>", "Path to bid JSON (signature optional)")
  .requiredOption("-n, --nonce <nonce>", "Signer nonce to embed")
  .action((bidFile: string, options: { nonce: string }) => {
    const bid = parseUnsignedBid(readJson(bidFile));
    console.log(verifierFromEnv().digestForBid(bid, parseNonce(options.nonce)));
  });

program
  .command("sign-bid")
  .description("Sign a bid with a private key")
  .argument("<bid-file>", "Path to unsigned bid JSON")
  .requiredOption("-k, --private-key <key>", "Signer private key (0x-prefixed hex)")
  .requiredOption("-n, --nonce <nonce>", "Signer's current nonce on the engine")
  .option("-o, --output <path>", "Write the signed bid JSON here instead of stdout")
  .action(
    async (
      bidFile: string,
      options: { privateKey: string; nonce: string; output?: string }
    ) => {
      if (!isPrivateKey(options.privateKey)) {
        console.error("Error: private key must be 32 bytes of 0x-prefixed hex");
        process.exit(1);
      }

      const { domain } = loadConfig();
      const bid = parseUnsignedBid(readJson(bidFile));
      const signed = await signBidWithViem(
        options.privateKey,
        domain,
        bid,
        parseNonce(options.nonce)
      );
      const output = JSON.stringify(serializeBidData(signed), null, 2);

      if (options.output) {
        fs.writeFileSync(options.output, output);
        console.log(`Signed bid saved to: ${options.output}`);
      } else {
        console.log(output);
      }
    }
  );

program
  .command("recover-signer")
  .description("Recover the address that signed a bid at a nonce")
  .argument("<bid-file>", "Path to signed bid JSON")
  .requiredOption("-n, --nonce <nonce>", "Nonce the bid was signed at")
  .action((bidFile: string, options: { nonce: string }) => {
    const bid = parseBidData(readJson(bidFile));
    const verifier = verifierFromEnv();
    const recovered = verifier.recoverSigner(
      verifier.digestForBid(bid, parseNonce(options.nonce)),
      bid.signature
    );

    console.log(`Recovered signer: ${recovered}`);
    console.log(`Claimed signer:   ${bid.signerAddress}`);
    if (recovered !== bid.signerAddress) {
      console.error("Signature does NOT match the claimed signer");
      process.exit(1);
    }
    console.log("Signature matches the claimed signer");
  });

program.parseAsync(process.argv).catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
