import { Module } from "@nestjs/common";
import { RunLogController } from "./run-log.controller";
import { RunLogService } from "./run-log.service";

@Module({
  providers: [RunLogService],
  controllers: [RunLogController],
  exports: [RunLogService],
})
export class RunLogModule {}
