import { Logger } from "@nestjs/common";
import { parse } from "csv-parse/sync";
import { promises as fs } from "fs";

const logger = new Logger("ResultParser");

/**
 * Reads the ranked endpoints from the speed-test result CSV.
 *
 * Row 0 is the header. Column 0 of every following row is an endpoint, in
 * the tool's own ranking order; collection stops after `max` endpoints.
 * An unreadable or malformed file yields an empty list.
 */
export async function parseResultCsv(
  path: string,
  max: number,
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    logger.warn(
      `Cannot read result file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return [];
  }

  let rows: unknown;
  try {
    rows = parse(content, { bom: true, skip_empty_lines: true });
  } catch (error) {
    logger.warn(
      `Cannot decode result file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return [];
  }

  if (!Array.isArray(rows)) {
    return [];
  }

  const endpoints: string[] = [];
  for (const row of rows.slice(1)) {
    if (endpoints.length >= max) {
      break;
    }
    const first: unknown = Array.isArray(row) ? row[0] : undefined;
    if (typeof first === "string" && first.trim().length > 0) {
      endpoints.push(first.trim());
    }
  }

  return endpoints;
}
