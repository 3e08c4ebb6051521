import { Body, Controller, Get, Put } from "@nestjs/common";
import { SettingsService } from "./settings.service";
import type { RunSettingsView } from "./settings.types";
import { toSettingsView } from "./settings.util";

@Controller("settings")
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  get(): RunSettingsView {
    return toSettingsView(this.settingsService.get());
  }

  @Put()
  async save(@Body() body: unknown): Promise<RunSettingsView> {
    const saved = await this.settingsService.save(body);
    return toSettingsView(saved);
  }
}
