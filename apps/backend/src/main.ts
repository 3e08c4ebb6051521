import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import "dotenv/config";
import { existsSync, readFileSync, readdirSync } from "fs";
import { basename, dirname, resolve } from "path";
import { AppModule } from "./app.module";
import { AppService } from "./app.service";
import { RunLogService } from "./run-log/run-log.service";
import { resolveEnvFileVariables } from "./utils/env-file";

function resolveConfigFilePath(inputPath: string): string {
  const absolutePath = resolve(inputPath);

  if (!/[*?[]/.test(inputPath)) {
    return absolutePath;
  }

  const directory = dirname(absolutePath);
  const filePattern = basename(absolutePath);

  if (!existsSync(directory)) {
    throw new Error(`Directory does not exist: ${directory}`);
  }

  const regex = new RegExp(
    "^" +
      filePattern
        .replace(/[.+^${}()|\\]/g, "\\$&")
        .replace(/\*/g, ".*")
        .replace(/\?/g, ".") +
      "$",
    "i",
  );

  const matches = readdirSync(directory)
    .filter((name) => regex.test(name))
    .sort((a, b) => a.localeCompare(b));

  if (matches.length === 0) {
    throw new Error(`No files matched pattern: ${inputPath}`);
  }

  return resolve(directory, matches[0]);
}

function loadHttpsOptions(
  logger: Logger,
): { key: Buffer; cert: Buffer; ca?: Buffer } | undefined {
  if (process.env.HTTPS_ENABLED !== "true") {
    return undefined;
  }

  const certPath = process.env.HTTPS_CERT_PATH;
  const keyPath = process.env.HTTPS_KEY_PATH;
  const caPath = process.env.HTTPS_CA_PATH;

  if (!certPath || !keyPath) {
    logger.error(
      "HTTPS_ENABLED is true but HTTPS_CERT_PATH or HTTPS_KEY_PATH is missing",
    );
    process.exit(1);
  }

  try {
    const httpsOptions: { key: Buffer; cert: Buffer; ca?: Buffer } = {
      cert: readFileSync(resolveConfigFilePath(certPath)),
      key: readFileSync(resolveConfigFilePath(keyPath)),
    };

    // Optional CA certificate chain
    if (caPath) {
      httpsOptions.ca = readFileSync(resolveConfigFilePath(caPath));
    }

    logger.log(`HTTPS certificates loaded (certificate: ${certPath})`);
    return httpsOptions;
  } catch (error) {
    logger.error("Failed to load HTTPS certificates:", error);
    process.exit(1);
  }
}

async function bootstrap() {
  const logger = new Logger("Bootstrap");

  // Secrets mounted as files must be in process.env before settings are seeded.
  resolveEnvFileVariables();

  const httpsOptions = loadHttpsOptions(logger);
  const httpsEnabled = httpsOptions !== undefined;

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    httpsOptions,
    logger: ["error", "warn", "log", "debug", "verbose"],
  });
  app.enableShutdownHooks();

  app.setGlobalPrefix("api");

  const corsOrigins = process.env.CORS_ORIGINS?.split(",")
    .map((o) => o.trim())
    .filter(Boolean);
  if (corsOrigins && corsOrigins.length > 0) {
    app.enableCors({ origin: corsOrigins, credentials: true });
    logger.log(`CORS enabled for origins: ${corsOrigins.join(", ")}`);
  } else if (process.env.NODE_ENV === "development") {
    app.enableCors();
    logger.log("CORS enabled for all origins (development mode)");
  }

  const port = Number.parseInt(process.env.PORT ?? "8080", 10) || 8080;
  await app.listen(port);

  const protocol = httpsEnabled ? "https" : "http";
  const version = app.get(AppService).getVersion();
  logger.log(`API available at: ${protocol}://localhost:${port}/api`);
  await app
    .get(RunLogService)
    .info(`Web server running on :${port} (version ${version})`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
