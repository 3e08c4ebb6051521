import { Injectable } from "@nestjs/common";
import { CloudflareDnsService } from "../cloudflare/cloudflare-dns.service";
import { RunLogService } from "../run-log/run-log.service";
import type { RunSettings } from "../settings/settings.types";

/**
 * Decides the root domain used to shorten record names.
 *
 * An explicit root domain always wins and skips the API. Otherwise the zone
 * is asked for its name; when that fails, or no credentials exist, the
 * result is "" and records are created under their full domain name.
 */
@Injectable()
export class ZoneNameService {
  constructor(
    private readonly cloudflare: CloudflareDnsService,
    private readonly runLog: RunLogService,
  ) {}

  async resolve(settings: RunSettings): Promise<string> {
    const configured = settings.mainDomain.trim();
    if (configured) {
      await this.runLog.info(`✅ Using configured root domain: ${configured}`);
      return configured;
    }

    if (!settings.zoneId || !settings.apiKey) {
      await this.runLog.info(
        "No root domain and no zone credentials; record names will be full domain names",
      );
      return "";
    }

    try {
      const zoneName = await this.cloudflare.getZoneName({
        zoneId: settings.zoneId,
        apiKey: settings.apiKey,
        email: settings.email,
      });
      await this.runLog.info(`✅ Detected root domain: ${zoneName}`);
      return zoneName;
    } catch (error) {
      await this.runLog.warn(
        `⚠️ Could not detect the root domain (${error instanceof Error ? error.message : String(error)}); records will be named by their full domain name, which some zones suffix twice. Set the root domain in settings to avoid this.`,
      );
      return "";
    }
  }
}
