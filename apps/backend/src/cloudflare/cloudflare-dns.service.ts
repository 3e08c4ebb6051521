import { HttpService } from "@nestjs/axios";
import {
  HttpException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from "@nestjs/common";
import type { AxiosError, AxiosRequestConfig } from "axios";
import { firstValueFrom } from "rxjs";
import {
  CLOUDFLARE_API_BASE_URL_TOKEN,
  PUBLISHED_RECORD_TTL,
  RECORD_LIST_PAGE_SIZE,
} from "./cloudflare.constants";
import type {
  CloudflareApiMessage,
  CloudflareApiResponse,
  CloudflareCredentials,
  CloudflareDnsRecord,
  CloudflareZone,
  CreateDnsRecordInput,
  CreateDnsRecordPayload,
} from "./cloudflare.types";

/**
 * Client for the four zone operations the publisher needs.
 *
 * Every failure surfaces as a Nest HttpException: transport and HTTP errors
 * via normalizeAxiosError, `success: false` envelopes via unwrapApiResponse.
 */
@Injectable()
export class CloudflareDnsService {
  private readonly logger = new Logger(CloudflareDnsService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(CLOUDFLARE_API_BASE_URL_TOKEN)
    private readonly baseUrl: string,
  ) {}

  async getZoneName(credentials: CloudflareCredentials): Promise<string> {
    const envelope = await this.request<CloudflareApiResponse<CloudflareZone>>(
      credentials,
      { method: "GET", url: `/zones/${encodeURIComponent(credentials.zoneId)}` },
      "zone lookup",
    );

    const zone = this.unwrapApiResponse(envelope, "zone lookup");
    const name = typeof zone.name === "string" ? zone.name.trim() : "";
    if (!name) {
      throw new ServiceUnavailableException(
        `Cloudflare zone "${credentials.zoneId}" did not report a name.`,
      );
    }

    return name;
  }

  /**
   * Ids of all records whose name matches `name` exactly, of any type.
   */
  async listRecordIds(
    credentials: CloudflareCredentials,
    name: string,
  ): Promise<string[]> {
    const envelope = await this.request<
      CloudflareApiResponse<CloudflareDnsRecord[]>
    >(
      credentials,
      {
        method: "GET",
        url: `/zones/${encodeURIComponent(credentials.zoneId)}/dns_records`,
        params: { name, per_page: RECORD_LIST_PAGE_SIZE },
      },
      `record list for ${name}`,
    );

    const records = this.unwrapApiResponse(envelope, `record list for ${name}`);
    return records
      .map((record) => record.id)
      .filter((id): id is string => typeof id === "string" && id.length > 0);
  }

  async deleteRecord(
    credentials: CloudflareCredentials,
    recordId: string,
  ): Promise<void> {
    const envelope = await this.request<
      CloudflareApiResponse<{ id: string }>
    >(
      credentials,
      {
        method: "DELETE",
        url: `/zones/${encodeURIComponent(credentials.zoneId)}/dns_records/${encodeURIComponent(recordId)}`,
      },
      `delete of record ${recordId}`,
    );

    this.assertSuccess(envelope, `delete of record ${recordId}`);
  }

  async createRecord(
    credentials: CloudflareCredentials,
    input: CreateDnsRecordInput,
  ): Promise<CloudflareDnsRecord> {
    const payload: CreateDnsRecordPayload = {
      ...input,
      ttl: PUBLISHED_RECORD_TTL,
      proxied: false,
    };
    const context = `create of ${input.type} record ${input.name} -> ${input.content}`;

    const envelope = await this.request<
      CloudflareApiResponse<CloudflareDnsRecord>
    >(
      credentials,
      {
        method: "POST",
        url: `/zones/${encodeURIComponent(credentials.zoneId)}/dns_records`,
        data: payload,
      },
      context,
    );

    return this.unwrapApiResponse(envelope, context);
  }

  private async request<T>(
    credentials: CloudflareCredentials,
    config: AxiosRequestConfig,
    context: string,
  ): Promise<T> {
    try {
      const response = await firstValueFrom(
        this.httpService.request<T>({
          baseURL: this.baseUrl,
          timeout: 30_000,
          ...config,
          headers: {
            "X-Auth-Email": credentials.email,
            "X-Auth-Key": credentials.apiKey,
            "Content-Type": "application/json",
          },
        }),
      );
      return response.data;
    } catch (error) {
      throw this.normalizeAxiosError(error, context);
    }
  }

  private assertSuccess<T>(
    envelope: CloudflareApiResponse<T> | undefined,
    context: string,
  ): void {
    if (!envelope) {
      throw new ServiceUnavailableException(
        `Cloudflare returned no data for ${context}.`,
      );
    }

    if (!envelope.success) {
      throw new ServiceUnavailableException(
        `Cloudflare rejected ${context}: ${this.describeMessages(envelope.errors)}.`,
      );
    }
  }

  private unwrapApiResponse<T>(
    envelope: CloudflareApiResponse<T> | undefined,
    context: string,
  ): T {
    this.assertSuccess(envelope, context);

    const result = envelope?.result;
    if (result === undefined || result === null) {
      throw new ServiceUnavailableException(
        `Cloudflare did not include a result for ${context}.`,
      );
    }

    return result;
  }

  private describeMessages(messages: CloudflareApiMessage[] | undefined): string {
    const parts = (messages ?? [])
      .map((entry) =>
        entry.code !== undefined
          ? `${entry.code}: ${entry.message ?? "unknown error"}`
          : (entry.message ?? ""),
      )
      .filter((part) => part.length > 0);
    return parts.length > 0 ? parts.join("; ") : "unknown error";
  }

  private normalizeAxiosError(error: unknown, context: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    if (this.isAxiosError(error)) {
      if (error.response) {
        const { status, data, statusText } = error.response;
        const message = this.isApiEnvelope(data)
          ? this.describeMessages(data.errors)
          : typeof data === "string" && data.length > 0
            ? data
            : statusText;

        return new HttpException(
          {
            message: `Cloudflare ${context} failed with status ${status}: ${message}`,
            details: data,
          },
          status ?? 500,
        );
      }

      this.logger.error(
        `Network error during Cloudflare ${context}: ${error.message}`,
      );

      return new ServiceUnavailableException(
        `Unable to reach Cloudflare for ${context}: ${error.message}`,
      );
    }

    this.logger.error(
      `Unexpected error during Cloudflare ${context}`,
      error instanceof Error ? error.stack : String(error),
    );
    return new ServiceUnavailableException(
      `Unexpected error during Cloudflare ${context}.`,
    );
  }

  private isApiEnvelope(data: unknown): data is CloudflareApiResponse<unknown> {
    return (
      !!data &&
      typeof data === "object" &&
      "success" in data &&
      "errors" in data &&
      Array.isArray(data.errors)
    );
  }

  private isAxiosError(error: unknown): error is AxiosError {
    return !!error && typeof error === "object" && "isAxiosError" in error;
  }
}
