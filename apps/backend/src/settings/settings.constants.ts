import type { RunSettings } from "./settings.types";

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  cronSpec: "",
  zoneId: "",
  apiKey: "",
  email: "",
  mainDomain: "",
  domains: "",
  downloadUrl: "",
  testCount: 10,
  maxResult: 10,
  minSpeed: 0,
  maxDelay: 9999,
  minDelay: 0,
  testPort: 443,
  ipType: "v4",
  colo: "",
  enableHttping: false,
};

export const API_KEY_MASK_PREFIX = "********";
