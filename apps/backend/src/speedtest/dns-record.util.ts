import type { DnsRecordType } from "../cloudflare/cloudflare.types";

export const ZONE_APEX_RECORD_NAME = "@";

/**
 * Record name relative to the zone apex, compared case-insensitively.
 *
 * Some zone APIs append the zone to whatever name they are given, so
 * `sub.example.com` must be sent as `sub` to avoid
 * `sub.example.com.example.com`. Without a matching zone the FQDN is used
 * verbatim.
 */
export function computeRecordName(fqdn: string, zoneName: string): string {
  const zone = zoneName.trim().toLowerCase();
  if (!zone) {
    return fqdn;
  }

  const domain = fqdn.toLowerCase();
  if (domain === zone) {
    return ZONE_APEX_RECORD_NAME;
  }

  if (domain.endsWith(`.${zone}`)) {
    return fqdn.slice(0, fqdn.length - zone.length - 1);
  }

  return fqdn;
}

/**
 * Anything containing a colon is treated as IPv6. Endpoints are not
 * validated further; the DNS API rejects malformed ones.
 */
export function inferRecordType(endpoint: string): DnsRecordType {
  return endpoint.includes(":") ? "AAAA" : "A";
}
