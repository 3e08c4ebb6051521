import { Inject, Injectable } from "@nestjs/common";
import { promises as fs } from "fs";
import { DATA_PATHS_TOKEN } from "../data-paths/data-paths.constants";
import type { DataPaths } from "../data-paths/data-paths";
import type { IpPoolType } from "../settings/settings.types";
import { RunAbortedError } from "./speedtest.errors";

export interface EndpointPoolPresence {
  ipv4: boolean;
  ipv6: boolean;
}

@Injectable()
export class EndpointSourceService {
  constructor(
    @Inject(DATA_PATHS_TOKEN)
    private readonly paths: DataPaths,
  ) {}

  /**
   * Path of the endpoint list to feed the speed test. For `both`, the two
   * pools are merged into a derived file; the pools themselves are not
   * modified.
   */
  async resolve(ipType: IpPoolType): Promise<string> {
    let target: string;
    switch (ipType) {
      case "v6":
        target = this.paths.ipv6File;
        break;
      case "both":
        target = await this.combinePools();
        break;
      default:
        target = this.paths.ipv4File;
    }

    if (!(await this.exists(target))) {
      throw new RunAbortedError(`Endpoint pool file not found: ${target}`);
    }

    return target;
  }

  async describePools(): Promise<EndpointPoolPresence> {
    const [ipv4, ipv6] = await Promise.all([
      this.exists(this.paths.ipv4File),
      this.exists(this.paths.ipv6File),
    ]);
    return { ipv4, ipv6 };
  }

  private async combinePools(): Promise<string> {
    const parts: string[] = [];
    for (const source of [this.paths.ipv4File, this.paths.ipv6File]) {
      try {
        parts.push(await fs.readFile(source, "utf-8"));
      } catch (error) {
        throw new RunAbortedError(
          `Failed to merge endpoint pools, cannot read ${source}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    // A pool without a trailing newline must not run into the next one.
    await fs.writeFile(
      this.paths.combinedFile,
      parts.map((content) => `${content}\n`).join(""),
      "utf-8",
    );
    return this.paths.combinedFile;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }
}
