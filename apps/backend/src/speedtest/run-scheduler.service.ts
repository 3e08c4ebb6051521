import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { SchedulerRegistry } from "@nestjs/schedule";
import { CronJob } from "cron";
import { RunLogService } from "../run-log/run-log.service";
import { SettingsService } from "../settings/settings.service";
import { RunCoordinatorService } from "./run-coordinator.service";

export const SPEEDTEST_CRON_JOB = "speedtest-run";

/**
 * Keeps one cron job in sync with the saved cron expression. Every save
 * replaces the job; an empty expression means manual runs only.
 */
@Injectable()
export class RunSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RunSchedulerService.name);
  private unsubscribe?: () => void;

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly settingsService: SettingsService,
    private readonly coordinator: RunCoordinatorService,
    private readonly runLog: RunLogService,
  ) {}

  onModuleInit(): void {
    this.apply(this.settingsService.get().cronSpec);
    this.unsubscribe = this.settingsService.onChange((settings) => {
      this.apply(settings.cronSpec);
    });
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.removeJob();
  }

  /**
   * Replaces the scheduled job. Returns whether a job is now active.
   */
  apply(cronSpec: string): boolean {
    this.removeJob();

    const expression = cronSpec.trim();
    if (!expression) {
      this.logger.log("No cron expression configured, scheduled runs disabled");
      return false;
    }

    let job: CronJob;
    try {
      job = new CronJob(expression, () => {
        this.coordinator.trigger("schedule");
      });
    } catch (error) {
      this.logger.warn(
        `Invalid cron expression "${expression}": ${error instanceof Error ? error.message : String(error)}`,
      );
      void this.runLog.warn(
        `⚠️ Invalid cron expression "${expression}", scheduled runs disabled`,
      );
      return false;
    }

    this.schedulerRegistry.addCronJob(SPEEDTEST_CRON_JOB, job);
    job.start();
    this.logger.log(`Scheduled speed test runs with "${expression}"`);
    return true;
  }

  getNextRunAt(): string | null {
    if (!this.schedulerRegistry.doesExist("cron", SPEEDTEST_CRON_JOB)) {
      return null;
    }
    const job = this.schedulerRegistry.getCronJob(SPEEDTEST_CRON_JOB);
    return job.nextDate().toJSDate().toISOString();
  }

  private removeJob(): void {
    if (this.schedulerRegistry.doesExist("cron", SPEEDTEST_CRON_JOB)) {
      this.schedulerRegistry.deleteCronJob(SPEEDTEST_CRON_JOB);
    }
  }
}
