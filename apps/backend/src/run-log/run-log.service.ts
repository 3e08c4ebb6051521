import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { format } from "date-fns";
import { promises as fs } from "fs";
import { DATA_PATHS_TOKEN } from "../data-paths/data-paths.constants";
import type { DataPaths } from "../data-paths/data-paths";

export interface RunLogChunk {
  log: string;
  offset: number;
}

type RunLogLevel = "log" | "warn" | "error";

/**
 * Append-only run log shown to operators.
 *
 * Writes go through a single promise chain so that streamed tool output and
 * coordinator milestones never interleave inside a line. The public write
 * methods never reject: a failed append is reported to the process logger.
 */
@Injectable()
export class RunLogService implements OnModuleInit {
  private readonly logger = new Logger(RunLogService.name);
  private readonly outputLogger = new Logger("SpeedtestOutput");
  private queue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(DATA_PATHS_TOKEN)
    private readonly paths: DataPaths,
  ) {}

  async onModuleInit(): Promise<void> {
    try {
      await fs.access(this.paths.logFile);
    } catch {
      await fs.writeFile(this.paths.logFile, "Service initialized...\n", "utf-8");
    }
  }

  info(message: string): Promise<void> {
    return this.write("log", message);
  }

  warn(message: string): Promise<void> {
    return this.write("warn", message);
  }

  error(message: string): Promise<void> {
    return this.write("error", message);
  }

  /**
   * Appends one raw line of speed-test output, without a timestamp.
   */
  appendOutput(line: string): Promise<void> {
    this.outputLogger.verbose(line);
    return this.append(`${line}\n`);
  }

  /**
   * Resolves once every write queued so far has reached the file.
   */
  flush(): Promise<void> {
    return this.queue;
  }

  /**
   * Returns the log content after `offset` bytes and the offset to ask for
   * next. An offset beyond the end of the file (it was cleared) restarts at 0.
   */
  async read(offset: number): Promise<RunLogChunk> {
    await this.queue;

    let size: number;
    try {
      size = (await fs.stat(this.paths.logFile)).size;
    } catch {
      return { log: "", offset: 0 };
    }

    const start =
      Number.isFinite(offset) && offset >= 0 && offset <= size
        ? Math.floor(offset)
        : 0;
    const length = size - start;
    if (length === 0) {
      return { log: "", offset: start };
    }

    const handle = await fs.open(this.paths.logFile, "r");
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, start);
      return {
        log: buffer.subarray(0, bytesRead).toString("utf-8"),
        offset: start + bytesRead,
      };
    } finally {
      await handle.close();
    }
  }

  /**
   * Truncates the log file. Unlike appends, a failure is thrown to the caller.
   */
  async clear(): Promise<void> {
    await this.exclusive(() => fs.truncate(this.paths.logFile, 0));
    await this.info("=== Log cleared manually ===");
  }

  private write(level: RunLogLevel, message: string): Promise<void> {
    this.logger[level](message);
    return this.append(
      `[${format(new Date(), "yyyy-MM-dd HH:mm:ss")}] ${message}\n`,
    );
  }

  private append(text: string): Promise<void> {
    return this.exclusive(() =>
      fs.appendFile(this.paths.logFile, text, "utf-8"),
    ).catch((error: unknown) => {
      this.logger.error(
        `Failed to write run log ${this.paths.logFile}: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }

  // The chain only orders tasks; each task's outcome goes to its own caller.
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
