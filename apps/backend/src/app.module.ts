import { Module } from "@nestjs/common";
import { ScheduleModule } from "@nestjs/schedule";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { CloudflareModule } from "./cloudflare/cloudflare.module";
import { DataPathsModule } from "./data-paths/data-paths.module";
import { RunLogModule } from "./run-log/run-log.module";
import { SettingsModule } from "./settings/settings.module";
import { SpeedtestModule } from "./speedtest/speedtest.module";

@Module({
  imports: [
    ScheduleModule.forRoot(),
    DataPathsModule,
    RunLogModule,
    SettingsModule,
    CloudflareModule,
    SpeedtestModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
