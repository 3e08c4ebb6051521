import { Controller, Get, HttpCode, Post } from "@nestjs/common";
import { EndpointSourceService } from "./endpoint-source.service";
import { RunCoordinatorService } from "./run-coordinator.service";
import { RunSchedulerService } from "./run-scheduler.service";
import { SpeedtestRunnerService } from "./speedtest-runner.service";
import type { RunRecord } from "./speedtest.types";

export interface RunTriggerResponse {
  accepted: boolean;
  running: boolean;
}

export interface RunStatusResponse {
  running: boolean;
  nextRunAt: string | null;
  lastRun: RunRecord | null;
  executablePresent: boolean;
  ipv4PoolPresent: boolean;
  ipv6PoolPresent: boolean;
}

@Controller()
export class RunController {
  constructor(
    private readonly coordinator: RunCoordinatorService,
    private readonly scheduler: RunSchedulerService,
    private readonly runner: SpeedtestRunnerService,
    private readonly endpointSource: EndpointSourceService,
  ) {}

  /**
   * Starts a run without waiting for it; progress shows up in the log.
   */
  @Post("run")
  @HttpCode(202)
  run(): RunTriggerResponse {
    const accepted = this.coordinator.trigger("manual");
    return { accepted, running: this.coordinator.isRunning() };
  }

  @Get("status")
  async status(): Promise<RunStatusResponse> {
    const [executablePresent, pools] = await Promise.all([
      this.runner.isExecutablePresent(),
      this.endpointSource.describePools(),
    ]);

    return {
      running: this.coordinator.isRunning(),
      nextRunAt: this.scheduler.getNextRunAt(),
      lastRun: this.coordinator.getLastRun(),
      executablePresent,
      ipv4PoolPresent: pools.ipv4,
      ipv6PoolPresent: pools.ipv6,
    };
  }
}
