export const CLOUDFLARE_API_BASE_URL_TOKEN = "CLOUDFLARE_API_BASE_URL";

export const DEFAULT_CLOUDFLARE_API_BASE_URL =
  "https://api.cloudflare.com/client/v4";

/** TTL of published records, in seconds. */
export const PUBLISHED_RECORD_TTL = 60;

export const RECORD_LIST_PAGE_SIZE = 100;
