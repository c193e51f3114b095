import type { DomainParams } from "../domain/domainContext.js";

export interface EngineConfig {
  domain: DomainParams;
  logLevel: string;
}
