import { Module } from "@nestjs/common";
import { CloudflareModule } from "../cloudflare/cloudflare.module";
import { RunLogModule } from "../run-log/run-log.module";
import { SettingsModule } from "../settings/settings.module";
import { DnsReconcileService } from "./dns-reconcile.service";
import { EndpointSourceService } from "./endpoint-source.service";
import { RunController } from "./run.controller";
import { RunCoordinatorService } from "./run-coordinator.service";
import { RunSchedulerService } from "./run-scheduler.service";
import { SpeedtestRunnerService } from "./speedtest-runner.service";
import { ZoneNameService } from "./zone-name.service";

@Module({
  imports: [RunLogModule, SettingsModule, CloudflareModule],
  controllers: [RunController],
  providers: [
    EndpointSourceService,
    SpeedtestRunnerService,
    ZoneNameService,
    DnsReconcileService,
    RunCoordinatorService,
    RunSchedulerService,
  ],
  exports: [RunCoordinatorService],
})
export class SpeedtestModule {}
