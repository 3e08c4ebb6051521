export type DnsRecordType = "A" | "AAAA";

export interface CloudflareCredentials {
  zoneId: string;
  apiKey: string;
  email: string;
}

export interface CloudflareApiMessage {
  code?: number;
  message?: string;
}

/**
 * Envelope wrapping every Cloudflare v4 response.
 */
export interface CloudflareApiResponse<T> {
  success: boolean;
  errors?: CloudflareApiMessage[];
  messages?: CloudflareApiMessage[];
  result?: T | null;
}

export interface CloudflareZone {
  id: string;
  name: string;
  status?: string;
}

export interface CloudflareDnsRecord {
  id: string;
  type?: string;
  name?: string;
  content?: string;
  ttl?: number;
  proxied?: boolean;
}

export interface CreateDnsRecordInput {
  type: DnsRecordType;
  name: string;
  content: string;
}

export interface CreateDnsRecordPayload extends CreateDnsRecordInput {
  ttl: number;
  proxied: boolean;
}
