import { Inject, Injectable } from "@nestjs/common";
import { ChildProcessWithoutNullStreams, spawn } from "child_process";
import { promises as fs } from "fs";
import { basename } from "path";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { DATA_PATHS_TOKEN } from "../data-paths/data-paths.constants";
import type { DataPaths } from "../data-paths/data-paths";
import { RunLogService } from "../run-log/run-log.service";
import { RunAbortedError } from "./speedtest.errors";

export interface SpeedtestExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Runs the external speed-test executable from the data directory and copies
 * its stdout and stderr into the run log line by line while it runs.
 */
@Injectable()
export class SpeedtestRunnerService {
  constructor(
    @Inject(DATA_PATHS_TOKEN)
    private readonly paths: DataPaths,
    private readonly runLog: RunLogService,
  ) {}

  get executableName(): string {
    return basename(this.paths.executable);
  }

  async isExecutablePresent(): Promise<boolean> {
    try {
      await fs.access(this.paths.executable);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Fails the run when the executable is missing and marks it runnable;
   * uploaded binaries often lose their mode bits.
   */
  async ensureExecutable(): Promise<void> {
    if (!(await this.isExecutablePresent())) {
      throw new RunAbortedError(
        `Speed test executable not found: ${this.paths.executable}`,
      );
    }
    await fs.chmod(this.paths.executable, 0o755);
  }

  /**
   * Resolves with the exit status once the process has closed and all of its
   * output is in the run log. A non-zero exit is returned, not thrown.
   */
  async run(args: string[]): Promise<SpeedtestExit> {
    await this.ensureExecutable();

    const child = this.spawnProcess(
      this.paths.executable,
      args,
      this.paths.dataDir,
    );

    const exit = await new Promise<SpeedtestExit>((resolve, reject) => {
      this.forwardLines(child.stdout);
      this.forwardLines(child.stderr);

      child.once("error", (error) => {
        reject(
          new RunAbortedError(`Failed to start speed test: ${error.message}`),
        );
      });
      child.once("close", (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });

    await this.runLog.flush();
    return exit;
  }

  protected spawnProcess(
    command: string,
    args: string[],
    cwd: string,
  ): ChildProcessWithoutNullStreams {
    return spawn(command, args, { cwd });
  }

  private forwardLines(stream: Readable): void {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    lines.on("line", (line) => {
      void this.runLog.appendOutput(line);
    });
  }
}
