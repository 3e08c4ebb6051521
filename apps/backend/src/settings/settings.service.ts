import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { promises as fs } from "fs";
import { DATA_PATHS_TOKEN } from "../data-paths/data-paths.constants";
import type { DataPaths } from "../data-paths/data-paths";
import { DEFAULT_RUN_SETTINGS } from "./settings.constants";
import type {
  RunSettings,
  RunSettingsListener,
  RunSettingsUpdate,
} from "./settings.types";
import {
  coerceStoredSettings,
  maskApiKey,
  normalizeSettingsUpdate,
  seedSettingsFromEnv,
} from "./settings.util";

/**
 * Single owner of the run configuration.
 *
 * Saves are serialized and each one is written to config.json before the
 * next may start. Readers get a copy, so a save during a run only affects
 * the next run.
 */
@Injectable()
export class SettingsService implements OnModuleInit {
  private readonly logger = new Logger(SettingsService.name);
  private settings: RunSettings = { ...DEFAULT_RUN_SETTINGS };
  private saveChain: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<RunSettingsListener>();

  constructor(
    @Inject(DATA_PATHS_TOKEN)
    private readonly paths: DataPaths,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.paths.configFile, "utf-8");
    } catch {
      this.settings = seedSettingsFromEnv(process.env);
      await this.persist(this.settings);
      this.logger.log(
        `No settings found; created ${this.paths.configFile} from environment defaults`,
      );
      return;
    }

    try {
      this.settings = coerceStoredSettings(JSON.parse(raw));
      this.logger.log(`Loaded settings from ${this.paths.configFile}`);
    } catch (error) {
      this.settings = { ...DEFAULT_RUN_SETTINGS };
      this.logger.warn(
        `Settings file ${this.paths.configFile} is not valid JSON, using defaults: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  get(): RunSettings {
    return { ...this.settings };
  }

  /**
   * Validates and applies a partial update, then notifies listeners.
   * A masked API key sent back unchanged keeps the stored key.
   */
  save(body: unknown): Promise<RunSettings> {
    const update = normalizeSettingsUpdate(body);

    const result = this.saveChain.then(() => this.apply(update));
    this.saveChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  onChange(listener: RunSettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async apply(update: RunSettingsUpdate): Promise<RunSettings> {
    const next: RunSettings = { ...this.settings, ...update };
    if (
      update.apiKey !== undefined &&
      this.settings.apiKey &&
      update.apiKey === maskApiKey(this.settings.apiKey)
    ) {
      next.apiKey = this.settings.apiKey;
    }

    await this.persist(next);
    this.settings = next;
    this.logger.log("Settings saved");

    const snapshot = this.get();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error(
          `Settings listener failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return snapshot;
  }

  private async persist(settings: RunSettings): Promise<void> {
    await fs.writeFile(
      this.paths.configFile,
      JSON.stringify(settings, null, 2),
      "utf-8",
    );
  }
}
