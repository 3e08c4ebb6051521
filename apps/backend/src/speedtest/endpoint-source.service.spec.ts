import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { buildDataPaths } from "../data-paths/data-paths";
import { EndpointSourceService } from "./endpoint-source.service";
import { RunAbortedError } from "./speedtest.errors";

describe("EndpointSourceService", () => {
  let dataDir: string;
  let service: EndpointSourceService;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "edgepick-pools-"));
    service = new EndpointSourceService(buildDataPaths(dataDir));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it("returns the IPv4 pool for v4", async () => {
    writeFileSync(join(dataDir, "ip.txt"), "198.51.100.0/24\n");

    await expect(service.resolve("v4")).resolves.toBe(join(dataDir, "ip.txt"));
  });

  it("returns the IPv6 pool for v6", async () => {
    writeFileSync(join(dataDir, "ipv6.txt"), "2001:db8::/32\n");

    await expect(service.resolve("v6")).resolves.toBe(
      join(dataDir, "ipv6.txt"),
    );
  });

  it("fails when the selected pool is missing", async () => {
    await expect(service.resolve("v4")).rejects.toThrow(
      `Endpoint pool file not found: ${join(dataDir, "ip.txt")}`,
    );
  });

  it("merges both pools with a newline after each", async () => {
    writeFileSync(join(dataDir, "ip.txt"), "198.51.100.0/24");
    writeFileSync(join(dataDir, "ipv6.txt"), "2001:db8::/32\n");

    const combined = await service.resolve("both");

    expect(combined).toBe(join(dataDir, "ip_combined.txt"));
    expect(readFileSync(combined, "utf-8")).toBe(
      "198.51.100.0/24\n2001:db8::/32\n\n",
    );
    expect(readFileSync(join(dataDir, "ip.txt"), "utf-8")).toBe(
      "198.51.100.0/24",
    );
  });

  it("names the unreadable pool when merging fails", async () => {
    writeFileSync(join(dataDir, "ip.txt"), "198.51.100.0/24\n");

    const failure = service.resolve("both");

    await expect(failure).rejects.toBeInstanceOf(RunAbortedError);
    await expect(failure).rejects.toThrow(join(dataDir, "ipv6.txt"));
  });

  it("reports which pools are present", async () => {
    writeFileSync(join(dataDir, "ipv6.txt"), "2001:db8::/32\n");

    await expect(service.describePools()).resolves.toEqual({
      ipv4: false,
      ipv6: true,
    });
  });
});
