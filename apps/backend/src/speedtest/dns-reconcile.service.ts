import { Injectable } from "@nestjs/common";
import { CloudflareDnsService } from "../cloudflare/cloudflare-dns.service";
import type { CloudflareCredentials } from "../cloudflare/cloudflare.types";
import { RunLogService } from "../run-log/run-log.service";
import type { RunSettings } from "../settings/settings.types";
import { computeRecordName, inferRecordType } from "./dns-record.util";
import { resolveResultCap } from "./speedtest-args.util";
import type {
  DomainOutcome,
  ReconcilePolicy,
  ReconcileSummary,
} from "./speedtest.types";

export interface ReconcileInput {
  /** Target domains in priority order. */
  domains: string[];
  /** Ranked endpoints, best first. */
  endpoints: string[];
  /** Zone apex used to shorten record names; "" keeps full names. */
  zoneName: string;
  settings: RunSettings;
}

export function selectReconcilePolicy(domainCount: number): ReconcilePolicy {
  return domainCount === 1 ? "load-balance" : "one-to-one";
}

/**
 * Replaces the address records of each target domain with freshly ranked
 * endpoints.
 *
 * Every domain is handled as list, delete all, then create. There is a short
 * window in which a domain resolves to nothing; callers accept it.
 * Failures are logged per record and never stop the remaining work, except
 * a failed listing, which leaves that one domain untouched.
 */
@Injectable()
export class DnsReconcileService {
  constructor(
    private readonly cloudflare: CloudflareDnsService,
    private readonly runLog: RunLogService,
  ) {}

  async reconcile(input: ReconcileInput): Promise<ReconcileSummary> {
    const { domains, endpoints, zoneName, settings } = input;

    if (!settings.zoneId || !settings.apiKey) {
      await this.runLog.warn(
        "⚠️ Zone id or API key missing, skipping DNS update",
      );
      return {
        skipped: true,
        domains: domains.map((domain) => this.untouched(domain, zoneName)),
      };
    }

    const credentials: CloudflareCredentials = {
      zoneId: settings.zoneId,
      apiKey: settings.apiKey,
      email: settings.email,
    };
    const policy = selectReconcilePolicy(domains.length);

    if (policy === "load-balance") {
      const [domain] = domains;
      const selected = endpoints.slice(
        0,
        resolveResultCap(settings.maxResult),
      );
      await this.runLog.info(
        `📡 Updating ${domain} with ${selected.length} endpoints (load-balance)`,
      );
      return {
        skipped: false,
        policy,
        domains: [await this.publish(credentials, domain, selected, zoneName)],
      };
    }

    await this.runLog.info(
      `📡 Updating ${domains.length} domains (one endpoint per domain)`,
    );

    const outcomes: DomainOutcome[] = [];
    for (let index = 0; index < domains.length; index++) {
      const domain = domains[index];
      const endpoint = endpoints[index];

      if (endpoint === undefined) {
        await this.runLog.warn(
          `⚠️ No endpoint left for ${domain}, keeping its current records`,
        );
        outcomes.push(this.untouched(domain, zoneName));
        continue;
      }

      await this.runLog.info(` -> ${domain} => ${endpoint}`);
      outcomes.push(
        await this.publish(credentials, domain, [endpoint], zoneName),
      );
    }

    return { skipped: false, policy, domains: outcomes };
  }

  private async publish(
    credentials: CloudflareCredentials,
    domain: string,
    endpoints: string[],
    zoneName: string,
  ): Promise<DomainOutcome> {
    const outcome = this.untouched(domain, zoneName);

    let recordIds: string[];
    try {
      recordIds = await this.cloudflare.listRecordIds(credentials, domain);
    } catch (error) {
      await this.runLog.error(
        `❌ Failed to list existing records for ${domain}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { ...outcome, status: "list-failed" };
    }

    if (recordIds.length > 0) {
      await this.runLog.info(
        `🗑️ Removing ${recordIds.length} existing records for ${domain}`,
      );
    } else {
      await this.runLog.info(`ℹ️ No existing records for ${domain}`);
    }

    for (const recordId of recordIds) {
      try {
        await this.cloudflare.deleteRecord(credentials, recordId);
        outcome.deleted++;
      } catch (error) {
        outcome.deleteFailures++;
        await this.runLog.warn(
          `⚠️ Failed to delete record ${recordId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    for (const endpoint of endpoints) {
      try {
        await this.cloudflare.createRecord(credentials, {
          type: inferRecordType(endpoint),
          name: outcome.recordName,
          content: endpoint,
        });
        outcome.created++;
      } catch (error) {
        outcome.createFailures++;
        await this.runLog.error(
          `❌ Failed to create record ${outcome.recordName} -> ${endpoint}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    await this.runLog.info(
      `✅ Created ${outcome.created} of ${endpoints.length} records for ${domain}`,
    );
    return { ...outcome, status: "updated" };
  }

  private untouched(domain: string, zoneName: string): DomainOutcome {
    return {
      domain,
      recordName: computeRecordName(domain, zoneName),
      status: "skipped",
      deleted: 0,
      deleteFailures: 0,
      created: 0,
      createFailures: 0,
    };
  }
}
