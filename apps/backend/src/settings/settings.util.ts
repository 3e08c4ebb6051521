import { BadRequestException } from "@nestjs/common";
import { CronTime } from "cron";
import { API_KEY_MASK_PREFIX, DEFAULT_RUN_SETTINGS } from "./settings.constants";
import {
  IP_POOL_TYPES,
  IpPoolType,
  RunSettings,
  RunSettingsUpdate,
  RunSettingsView,
} from "./settings.types";

const STRING_FIELDS = [
  "cronSpec",
  "zoneId",
  "apiKey",
  "email",
  "mainDomain",
  "domains",
  "downloadUrl",
  "colo",
] as const;

const INTEGER_FIELDS = [
  "testCount",
  "maxResult",
  "maxDelay",
  "minDelay",
  "testPort",
] as const;

type StringField = (typeof STRING_FIELDS)[number];

const TRUE_VALUES = new Set(["true", "on", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "off", "0", "no", ""]);

/**
 * Splits the comma-separated domain setting into trimmed, non-empty names.
 * Order is kept: it decides which domain gets which ranked endpoint.
 */
export function parseDomainList(input: string): string[] {
  return (input ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}

export function maskApiKey(apiKey: string): string {
  if (!apiKey) {
    return "";
  }
  return apiKey.length > 4
    ? `${API_KEY_MASK_PREFIX}${apiKey.slice(-4)}`
    : API_KEY_MASK_PREFIX;
}

export function toSettingsView(settings: RunSettings): RunSettingsView {
  return {
    ...settings,
    apiKey: maskApiKey(settings.apiKey),
    apiKeyConfigured: settings.apiKey.length > 0,
  };
}

export function isValidCronExpression(expression: string): boolean {
  try {
    new CronTime(expression);
    return true;
  } catch {
    return false;
  }
}

function isIpPoolType(value: unknown): value is IpPoolType {
  return (
    typeof value === "string" &&
    (IP_POOL_TYPES as readonly string[]).includes(value)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeStringField(field: StringField, value: string): string {
  const trimmed = value.trim();
  return field === "colo" ? trimmed.toUpperCase() : trimmed;
}

function parseNumber(
  field: string,
  value: unknown,
  integer: boolean,
): number | undefined {
  if (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim().length === 0)
  ) {
    return undefined;
  }

  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value.trim())
        : Number.NaN;

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new BadRequestException(
      `${field} must be a non-negative number.`,
    );
  }

  if (integer && !Number.isInteger(parsed)) {
    throw new BadRequestException(`${field} must be a whole number.`);
  }

  return parsed;
}

function parseBoolean(field: string, value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  const normalized =
    typeof value === "string" ? value.trim().toLowerCase() : undefined;

  if (normalized !== undefined && TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (normalized !== undefined && FALSE_VALUES.has(normalized)) {
    return false;
  }

  throw new BadRequestException(`${field} must be a boolean.`);
}

/**
 * Validates an incoming settings payload (JSON or form-style strings).
 * Only recognised fields are returned; unknown keys are ignored.
 */
export function normalizeSettingsUpdate(body: unknown): RunSettingsUpdate {
  if (!isRecord(body)) {
    throw new BadRequestException("Settings payload must be an object.");
  }

  const update: RunSettingsUpdate = {};

  for (const field of STRING_FIELDS) {
    const value = body[field];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== "string") {
      throw new BadRequestException(`${field} must be a string.`);
    }
    update[field] = normalizeStringField(field, value);
  }

  for (const field of INTEGER_FIELDS) {
    const parsed = parseNumber(field, body[field], true);
    if (parsed !== undefined) {
      update[field] = parsed;
    }
  }

  const minSpeed = parseNumber("minSpeed", body.minSpeed, false);
  if (minSpeed !== undefined) {
    update.minSpeed = minSpeed;
  }

  if (body.enableHttping !== undefined && body.enableHttping !== null) {
    update.enableHttping = parseBoolean("enableHttping", body.enableHttping);
  }

  if (body.ipType !== undefined && body.ipType !== null) {
    if (!isIpPoolType(body.ipType)) {
      throw new BadRequestException(
        `ipType must be one of: ${IP_POOL_TYPES.join(", ")}.`,
      );
    }
    update.ipType = body.ipType;
  }

  if (update.testPort !== undefined && update.testPort > 65535) {
    throw new BadRequestException("testPort must be between 0 and 65535.");
  }

  if (update.cronSpec && !isValidCronExpression(update.cronSpec)) {
    throw new BadRequestException(
      `cronSpec "${update.cronSpec}" is not a valid cron expression.`,
    );
  }

  return update;
}

/**
 * Reads settings loaded from disk leniently: fields with the wrong type fall
 * back to defaults instead of failing startup.
 */
export function coerceStoredSettings(raw: unknown): RunSettings {
  const settings: RunSettings = { ...DEFAULT_RUN_SETTINGS };
  if (!isRecord(raw)) {
    return settings;
  }

  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (typeof value === "string") {
      settings[field] = normalizeStringField(field, value);
    }
  }

  for (const field of [...INTEGER_FIELDS, "minSpeed"] as const) {
    const value = raw[field];
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
      settings[field] = value;
    }
  }

  if (typeof raw.enableHttping === "boolean") {
    settings.enableHttping = raw.enableHttping;
  }

  if (isIpPoolType(raw.ipType)) {
    settings.ipType = raw.ipType;
  }

  return settings;
}

const ENV_SEEDED_FIELDS: ReadonlyArray<[StringField, string]> = [
  ["cronSpec", "SPEEDTEST_CRON"],
  ["zoneId", "CLOUDFLARE_ZONE_ID"],
  ["apiKey", "CLOUDFLARE_API_KEY"],
  ["email", "CLOUDFLARE_EMAIL"],
  ["mainDomain", "SPEEDTEST_MAIN_DOMAIN"],
  ["domains", "SPEEDTEST_DOMAINS"],
];

/**
 * Initial settings for a data directory without config.json.
 */
export function seedSettingsFromEnv(env: NodeJS.ProcessEnv): RunSettings {
  const raw: Record<string, unknown> = {};
  for (const [field, envVar] of ENV_SEEDED_FIELDS) {
    const value = env[envVar];
    if (value !== undefined) {
      raw[field] = value;
    }
  }
  return coerceStoredSettings(raw);
}
