import "dotenv/config";
import { ethers } from "ethers";
import type { EngineConfig } from "./types/config.js";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadConfig(): EngineConfig {
  const chainId = requireEnv("RFQ_CHAIN_ID");
  if (!/^\d+$/.test(chainId)) {
    throw new Error(`RFQ_CHAIN_ID must be a decimal integer, got: ${chainId}`);
  }

  const verifyingContract = requireEnv("RFQ_VERIFYING_CONTRACT");
  if (!ethers.isAddress(verifyingContract)) {
    throw new Error(`RFQ_VERIFYING_CONTRACT is not an address: ${verifyingContract}`);
  }

  return {
    domain: {
      name: requireEnv("RFQ_DOMAIN_NAME"),
      version: requireEnv("RFQ_DOMAIN_VERSION"),
      chainId: BigInt(chainId),
      verifyingContract: ethers.getAddress(verifyingContract),
    },
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}
