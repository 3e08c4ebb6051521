export type IpPoolType = "v4" | "v6" | "both";

export const IP_POOL_TYPES: readonly IpPoolType[] = ["v4", "v6", "both"];

/**
 * Persisted configuration of the speed-test run and the DNS zone it feeds.
 */
export interface RunSettings {
  /** Cron expression; empty disables scheduled runs. */
  cronSpec: string;
  zoneId: string;
  apiKey: string;
  email: string;
  /** Explicit root domain used to shorten record names. */
  mainDomain: string;
  /** Comma-separated target domains, in priority order. */
  domains: string;
  downloadUrl: string;
  testCount: number;
  maxResult: number;
  /** Minimum download speed in MB/s. */
  minSpeed: number;
  /** Latency bounds in milliseconds. */
  maxDelay: number;
  minDelay: number;
  testPort: number;
  ipType: IpPoolType;
  /** Region (colo) codes, upper-case, comma-separated. */
  colo: string;
  enableHttping: boolean;
}

export type RunSettingsUpdate = Partial<RunSettings>;

/**
 * Settings as returned over HTTP: the API key is never echoed back.
 */
export interface RunSettingsView extends Omit<RunSettings, "apiKey"> {
  apiKey: string;
  apiKeyConfigured: boolean;
}

export type RunSettingsListener = (settings: RunSettings) => void;
