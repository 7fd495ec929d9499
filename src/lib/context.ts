import { loadPortalConfig, type PortalConfig } from "../config/portal.js";
import { CredentialStore } from "./credentials.js";
import { TokenService } from "./tokens.js";
import { JobCatalog } from "./job-catalog.js";
import { ApplicationLedger } from "./application-ledger.js";

/** Everything a function needs, created once per process and passed in. */
export interface PortalContext {
  config: PortalConfig;
  credentials: CredentialStore;
  tokens: TokenService;
  jobs: JobCatalog;
  applications: ApplicationLedger;
}

export function createPortalContext(
  config: PortalConfig = loadPortalConfig(),
  now?: () => number,
): PortalContext {
  const jobs = new JobCatalog();
  return {
    config,
    credentials: new CredentialStore(),
    tokens: new TokenService({ secret: config.jwtSecret, ttlMinutes: config.tokenTtlMinutes, now }),
    jobs,
    applications: new ApplicationLedger(jobs),
  };
}
