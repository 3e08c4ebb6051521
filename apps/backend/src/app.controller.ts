import { Controller, Get, Query } from "@nestjs/common";
import { AppService } from "./app.service";
import type { HealthCheckBasic, HealthCheckDetailed } from "./app.service";
import { RunCoordinatorService } from "./speedtest/run-coordinator.service";

@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly coordinator: RunCoordinatorService,
  ) {}

  @Get("health")
  getHealth(
    @Query("detailed") detailed?: string,
  ): HealthCheckBasic | HealthCheckDetailed {
    // Basic health check (fast, for Docker health checks)
    if (detailed !== "true") {
      return this.appService.getBasicHealth();
    }

    const lastRun = this.coordinator.getLastRun();
    return {
      ...this.appService.getBasicHealth(),
      version: this.appService.getVersion(),
      environment: process.env.NODE_ENV || "development",
      run: {
        running: this.coordinator.isRunning(),
        lastStatus: lastRun?.status ?? null,
        lastFinishedAt: lastRun?.finishedAt ?? null,
      },
    };
  }
}
