import { existsSync, readFileSync } from "fs";
import { Logger } from "@nestjs/common";

const logger = new Logger("EnvFile");

/**
 * Variables that may be supplied through a mounted secret file.
 */
export const SECRET_ENV_VARS = [
  "CLOUDFLARE_API_KEY",
  "CLOUDFLARE_EMAIL",
  "CLOUDFLARE_ZONE_ID",
] as const;

/**
 * Reads an environment variable, preferring `<VAR>_FILE` when it is set.
 *
 * The file contents are returned with trailing whitespace trimmed. This is
 * the Docker / Kubernetes secret-mount convention.
 *
 * @example
 * // With CLOUDFLARE_API_KEY_FILE=/run/secrets/cf_key
 * const key = getEnvOrFile("CLOUDFLARE_API_KEY");
 *
 * @param envVar - The base variable name (without the _FILE suffix)
 * @param options.required - Warn when neither form is set
 */
export function getEnvOrFile(
  envVar: string,
  options?: { required?: boolean },
): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath) {
    if (!existsSync(filePath)) {
      logger.error(
        `${fileEnvVar} is set to "${filePath}" but the file does not exist`,
      );
      return undefined;
    }

    try {
      const content = readFileSync(filePath, "utf-8").trim();
      logger.debug(
        `Loaded ${envVar} from file specified by ${fileEnvVar} (${filePath})`,
      );
      return content;
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error(`Failed to read file for ${fileEnvVar}: ${message}`);
      return undefined;
    }
  }

  const directValue = process.env[envVar];

  if (directValue === undefined && options?.required) {
    logger.warn(`Neither ${envVar} nor ${fileEnvVar} is set`);
  }

  return directValue;
}

/**
 * Copies every `<VAR>_FILE` secret into `process.env[VAR]` unless VAR is
 * already set. Call once at bootstrap, before settings are seeded. A missing
 * API key is only warned about: it can still be saved through the settings.
 */
export function resolveEnvFileVariables(): void {
  for (const envVar of SECRET_ENV_VARS) {
    if (process.env[envVar] !== undefined) {
      continue;
    }

    const value = getEnvOrFile(envVar, {
      required: envVar === "CLOUDFLARE_API_KEY",
    });
    if (value !== undefined) {
      process.env[envVar] = value;
      logger.log(`Loaded ${envVar} from ${envVar}_FILE`);
    }
  }
}
