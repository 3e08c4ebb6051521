import type { RunSettings } from "../settings/settings.types";

export const DEFAULT_RESULT_CAP = 10;
export const DEFAULT_TEST_PORT = 443;
export const HTTPING_FLAG = "-httping";

export interface SpeedtestArgsInput {
  resultFile: string;
  sourceFile: string;
  domainCount: number;
}

export interface SpeedtestPlan {
  args: string[];
  /** Endpoints to read back from the result file. */
  requiredCount: number;
  /** Value passed to `-dn`. */
  testCount: number;
  /** True when `testCount` was raised above the configured value. */
  escalated: boolean;
}

export function resolveResultCap(maxResult: number): number {
  return maxResult > 0 ? maxResult : DEFAULT_RESULT_CAP;
}

/**
 * Builds the speed-test argument vector.
 *
 * Several domains need at least one candidate each, so the requested count
 * grows to the domain count; the tool is then asked for at least that many.
 * A region filter only works in HTTPing mode, so `-cfcolo` forces it on.
 */
export function buildSpeedtestArgs(
  settings: RunSettings,
  input: SpeedtestArgsInput,
): SpeedtestPlan {
  let requiredCount = resolveResultCap(settings.maxResult);
  if (input.domainCount > 1 && input.domainCount > requiredCount) {
    requiredCount = input.domainCount;
  }

  const escalated = settings.testCount < requiredCount;
  const testCount = escalated ? requiredCount : settings.testCount;
  const port = settings.testPort > 0 ? settings.testPort : DEFAULT_TEST_PORT;

  const args = [
    "-o",
    input.resultFile,
    "-dn",
    String(testCount),
    "-sl",
    settings.minSpeed.toFixed(2),
    "-tl",
    String(settings.maxDelay),
    "-tll",
    String(settings.minDelay),
    "-tp",
    String(port),
    "-f",
    input.sourceFile,
  ];

  if (settings.downloadUrl) {
    args.push("-url", settings.downloadUrl);
  }

  if (settings.colo) {
    args.push("-cfcolo", settings.colo, HTTPING_FLAG);
  }

  if (settings.enableHttping && !args.includes(HTTPING_FLAG)) {
    args.push(HTTPING_FLAG);
  }

  return { args, requiredCount, testCount, escalated };
}
