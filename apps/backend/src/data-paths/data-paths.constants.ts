export const DATA_PATHS_TOKEN = "EDGEPICK_DATA_PATHS";

export const DEFAULT_DATA_DIR = "/app/data";
export const DEFAULT_SPEEDTEST_BINARY = "cfst";
