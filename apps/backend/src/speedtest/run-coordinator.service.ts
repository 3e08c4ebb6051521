import { Inject, Injectable, Logger } from "@nestjs/common";
import { DATA_PATHS_TOKEN } from "../data-paths/data-paths.constants";
import type { DataPaths } from "../data-paths/data-paths";
import { RunLogService } from "../run-log/run-log.service";
import { SettingsService } from "../settings/settings.service";
import { parseDomainList } from "../settings/settings.util";
import { DnsReconcileService } from "./dns-reconcile.service";
import { EndpointSourceService } from "./endpoint-source.service";
import { parseResultCsv } from "./result-parser.util";
import { buildSpeedtestArgs } from "./speedtest-args.util";
import { SpeedtestRunnerService } from "./speedtest-runner.service";
import { RunAbortedError } from "./speedtest.errors";
import type {
  ReconcileSummary,
  RunOutcome,
  RunRecord,
  RunTrigger,
} from "./speedtest.types";
import { ZoneNameService } from "./zone-name.service";

/**
 * Runs the speed test end to end: checks, tool invocation, result parsing
 * and DNS reconciliation. At most one run is active; a request that arrives
 * while one is active is refused, not queued.
 */
@Injectable()
export class RunCoordinatorService {
  private readonly logger = new Logger(RunCoordinatorService.name);
  private running = false;
  private lastRun: RunRecord | null = null;

  constructor(
    @Inject(DATA_PATHS_TOKEN)
    private readonly paths: DataPaths,
    private readonly settingsService: SettingsService,
    private readonly endpointSource: EndpointSourceService,
    private readonly runner: SpeedtestRunnerService,
    private readonly zoneNames: ZoneNameService,
    private readonly reconciler: DnsReconcileService,
    private readonly runLog: RunLogService,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  getLastRun(): RunRecord | null {
    return this.lastRun
      ? { ...this.lastRun, endpoints: [...this.lastRun.endpoints] }
      : null;
  }

  /**
   * Starts a run in the background. Returns false when one is already active.
   */
  trigger(trigger: RunTrigger): boolean {
    if (this.running) {
      void this.refuse();
      return false;
    }

    this.run(trigger).catch((error: unknown) => {
      this.logger.error(
        `Speed test run crashed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
    return true;
  }

  async run(trigger: RunTrigger = "manual"): Promise<RunOutcome> {
    if (this.running) {
      return this.refuse();
    }

    // Taken before the first await so that a concurrent caller sees it.
    this.running = true;
    const record: RunRecord = {
      trigger,
      startedAt: new Date().toISOString(),
      status: "running",
      message: "Speed test running",
      endpoints: [],
    };
    this.lastRun = record;

    try {
      const message = await this.execute(record);
      record.status = "completed";
      record.message = message;
    } catch (error) {
      record.status = "failed";
      if (error instanceof RunAbortedError) {
        record.message = error.message;
        await this.runLog.error(`❌ ${error.message}`);
      } else {
        record.message = `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
        this.logger.error(
          record.message,
          error instanceof Error ? error.stack : undefined,
        );
        await this.runLog.error(`❌ ${record.message}`);
      }
    } finally {
      record.finishedAt = new Date().toISOString();
      this.running = false;
    }

    return { status: record.status, message: record.message };
  }

  private async refuse(): Promise<RunOutcome> {
    const message = "A speed test is already running, skipping this request";
    await this.runLog.warn(`⚠️ ${message}`);
    return { status: "skipped", message };
  }

  private async execute(record: RunRecord): Promise<string> {
    await this.runLog.info(`=== Speed test started (${record.trigger}) ===`);
    const settings = this.settingsService.get();

    await this.runner.ensureExecutable();
    const sourceFile = await this.endpointSource.resolve(settings.ipType);

    const domains = parseDomainList(settings.domains);
    if (domains.length === 0) {
      throw new RunAbortedError("No target domains configured");
    }

    const zoneName = await this.zoneNames.resolve(settings);

    const plan = buildSpeedtestArgs(settings, {
      resultFile: this.paths.resultFile,
      sourceFile,
      domainCount: domains.length,
    });
    if (plan.escalated) {
      await this.runLog.info(
        `ℹ️ Test count raised to ${plan.testCount} to cover ${plan.requiredCount} results`,
      );
    }

    await this.runLog.info(
      `🚀 Running: ${this.runner.executableName} ${plan.args.join(" ")}`,
    );
    const exit = await this.runner.run(plan.args);
    if (exit.exitCode !== 0) {
      await this.runLog.warn(
        `⚠️ Speed test exited with ${exit.signal ? `signal ${exit.signal}` : `code ${exit.exitCode}`}, reading results anyway`,
      );
    }

    const endpoints = await parseResultCsv(
      this.paths.resultFile,
      plan.requiredCount,
    );
    record.endpoints = endpoints;
    if (endpoints.length === 0) {
      throw new RunAbortedError("No usable endpoints in the speed test results");
    }
    await this.runLog.info(`✅ Got ${endpoints.length} ranked endpoints`);

    const summary = await this.reconciler.reconcile({
      domains,
      endpoints,
      zoneName,
      settings,
    });

    await this.runLog.info("=== Task completed ===");
    return describeSummary(summary, endpoints.length);
  }
}

function describeSummary(
  summary: ReconcileSummary,
  endpointCount: number,
): string {
  if (summary.skipped) {
    return `Found ${endpointCount} endpoints; DNS update skipped`;
  }

  const updated = summary.domains.filter(
    (outcome) => outcome.status === "updated",
  );
  const created = updated.reduce((total, outcome) => total + outcome.created, 0);
  return `Found ${endpointCount} endpoints; ${created} records published to ${updated.length} of ${summary.domains.length} domains`;
}
