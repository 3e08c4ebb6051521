import { Controller, Get, HttpCode, Post, Query } from "@nestjs/common";
import { RunLogChunk, RunLogService } from "./run-log.service";

@Controller("logs")
export class RunLogController {
  constructor(private readonly runLogService: RunLogService) {}

  @Get()
  read(@Query("offset") offset?: string): Promise<RunLogChunk> {
    const parsed = Number.parseInt(offset ?? "0", 10);
    return this.runLogService.read(Number.isFinite(parsed) ? parsed : 0);
  }

  @Post("clear")
  @HttpCode(200)
  async clear(): Promise<{ cleared: true }> {
    await this.runLogService.clear();
    return { cleared: true };
  }
}
