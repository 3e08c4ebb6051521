import { Logger } from "@nestjs/common";
import { promises as fs } from "fs";
import { join } from "path";
import {
  DEFAULT_DATA_DIR,
  DEFAULT_SPEEDTEST_BINARY,
} from "./data-paths.constants";

/**
 * Files shared between the HTTP surface, the run coordinator and the
 * speed-test executable. Everything lives in one data directory, which is
 * also the working directory of the executable.
 */
export interface DataPaths {
  dataDir: string;
  configFile: string;
  logFile: string;
  executable: string;
  ipv4File: string;
  ipv6File: string;
  combinedFile: string;
  resultFile: string;
}

export function buildDataPaths(
  dataDir: string,
  binaryName: string = DEFAULT_SPEEDTEST_BINARY,
): DataPaths {
  return {
    dataDir,
    configFile: join(dataDir, "config.json"),
    logFile: join(dataDir, "app.log"),
    executable: join(dataDir, binaryName),
    ipv4File: join(dataDir, "ip.txt"),
    ipv6File: join(dataDir, "ipv6.txt"),
    combinedFile: join(dataDir, "ip_combined.txt"),
    resultFile: join(dataDir, "result.csv"),
  };
}

/**
 * Picks the first data directory candidate that can be created.
 * Prefers DATA_DIR, then the container default, then ./data.
 */
export async function resolveDataPaths(
  env: NodeJS.ProcessEnv = process.env,
): Promise<DataPaths> {
  const logger = new Logger("DataPaths");
  const candidates = [
    env.DATA_DIR?.trim(),
    DEFAULT_DATA_DIR,
    join(process.cwd(), "data"),
  ].filter((dir): dir is string => Boolean(dir));

  const binaryName =
    env.SPEEDTEST_BINARY?.trim() || DEFAULT_SPEEDTEST_BINARY;

  for (const dir of candidates) {
    try {
      await fs.mkdir(dir, { recursive: true });
      logger.log(`Data directory initialized: ${dir}`);
      return buildDataPaths(dir, binaryName);
    } catch (error) {
      logger.warn(
        `Failed to initialize data directory candidate ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  throw new Error("Unable to initialize any data directory");
}
