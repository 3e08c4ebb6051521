import { Injectable, Logger } from "@nestjs/common";
import { readFileSync } from "fs";
import { join } from "path";

export interface HealthCheckBasic {
  status: "ok";
  timestamp: string;
  uptime: number;
}

export interface HealthCheckDetailed extends HealthCheckBasic {
  version: string;
  environment: string;
  run: {
    running: boolean;
    lastStatus: string | null;
    lastFinishedAt: string | null;
  };
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);
  private readonly startTime = Date.now();
  private version?: string;

  getBasicHealth(): HealthCheckBasic {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  /**
   * Version from the backend package.json, which sits one level above both
   * src/ and dist/.
   */
  getVersion(): string {
    if (this.version === undefined) {
      this.version = readPackageVersion(join(__dirname, "..", "package.json"));
      if (this.version === "unknown") {
        this.logger.warn("Could not read the package version");
      }
    }
    return this.version;
  }
}

function readPackageVersion(path: string): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch {
    return "unknown";
  }
  return "unknown";
}
