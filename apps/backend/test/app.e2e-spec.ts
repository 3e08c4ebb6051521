import { Test, TestingModule } from "@nestjs/testing";
import { INestApplication } from "@nestjs/common";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import request from "supertest";
import { App } from "supertest/types";
import { join } from "path";
import os from "os";
import { AppModule } from "./../src/app.module";
import { CloudflareDnsService } from "./../src/cloudflare/cloudflare-dns.service";
import type { RunStatusResponse } from "./../src/speedtest/run.controller";

const SEEDED_ENV_VARS = [
  "SPEEDTEST_CRON",
  "CLOUDFLARE_ZONE_ID",
  "CLOUDFLARE_API_KEY",
  "CLOUDFLARE_EMAIL",
  "SPEEDTEST_MAIN_DOMAIN",
  "SPEEDTEST_DOMAINS",
  "SPEEDTEST_BINARY",
];

describe("Speed test publisher (e2e)", () => {
  let app: INestApplication<App>;
  let dataDir: string;
  const cloudflare = {
    getZoneName: jest.fn(),
    listRecordIds: jest.fn(),
    deleteRecord: jest.fn(),
    createRecord: jest.fn(),
  };

  beforeEach(async () => {
    dataDir = mkdtempSync(join(os.tmpdir(), "edgepick-e2e-"));
    process.env.DATA_DIR = dataDir;
    for (const envVar of SEEDED_ENV_VARS) {
      delete process.env[envVar];
    }

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(CloudflareDnsService)
      .useValue(cloudflare)
      .compile();

    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix("api");
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    rmSync(dataDir, { recursive: true, force: true });
    delete process.env.DATA_DIR;
  });

  const waitUntilIdle = async (): Promise<RunStatusResponse> => {
    for (let attempt = 0; attempt < 100; attempt++) {
      const response = await request(app.getHttpServer())
        .get("/api/status")
        .expect(200);
      const status: RunStatusResponse = response.body;
      if (!status.running) {
        return status;
      }
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    throw new Error("Run did not finish");
  };

  it("/api/health (GET)", async () => {
    const response = await request(app.getHttpServer())
      .get("/api/health")
      .expect(200);

    expect(response.body.status).toBe("ok");
  });

  it("creates settings with defaults in a fresh data directory", async () => {
    const response = await request(app.getHttpServer())
      .get("/api/settings")
      .expect(200);

    expect(response.body).toMatchObject({
      cronSpec: "",
      apiKey: "",
      apiKeyConfigured: false,
      testCount: 10,
      maxResult: 10,
      ipType: "v4",
    });
    expect(
      JSON.parse(readFileSync(join(dataDir, "config.json"), "utf-8")),
    ).toMatchObject({ testCount: 10, maxResult: 10 });
  });

  it("saves settings and masks the API key", async () => {
    const response = await request(app.getHttpServer())
      .put("/api/settings")
      .send({
        apiKey: "test-secret-1234",
        colo: " hkg,lax ",
        domains: "cdn.example.com",
        maxResult: "5",
      })
      .expect(200);

    expect(response.body).toMatchObject({
      apiKey: "********1234",
      apiKeyConfigured: true,
      colo: "HKG,LAX",
      domains: "cdn.example.com",
      maxResult: 5,
    });

    const stored = JSON.parse(
      readFileSync(join(dataDir, "config.json"), "utf-8"),
    );
    expect(stored.apiKey).toBe("test-secret-1234");

    await request(app.getHttpServer())
      .put("/api/settings")
      .send({ apiKey: "********1234" })
      .expect(200);
    expect(
      JSON.parse(readFileSync(join(dataDir, "config.json"), "utf-8")).apiKey,
    ).toBe("test-secret-1234");
  });

  it("rejects invalid settings", async () => {
    const response = await request(app.getHttpServer())
      .put("/api/settings")
      .send({ testPort: 70000 })
      .expect(400);

    expect(response.body.message).toBe("testPort must be between 0 and 65535.");
  });

  it("schedules runs once a cron expression is saved", async () => {
    const before = await request(app.getHttpServer())
      .get("/api/status")
      .expect(200);
    expect(before.body).toEqual({
      running: false,
      nextRunAt: null,
      lastRun: null,
      executablePresent: false,
      ipv4PoolPresent: false,
      ipv6PoolPresent: false,
    });

    await request(app.getHttpServer())
      .put("/api/settings")
      .send({ cronSpec: "0 3 * * *" })
      .expect(200);

    const after = await request(app.getHttpServer())
      .get("/api/status")
      .expect(200);
    expect(typeof after.body.nextRunAt).toBe("string");
  });

  it("serves and clears the run log", async () => {
    const initial = await request(app.getHttpServer())
      .get("/api/logs")
      .expect(200);
    expect(initial.body).toEqual({ log: "Service initialized...\n", offset: 23 });

    const unchanged = await request(app.getHttpServer())
      .get("/api/logs?offset=23")
      .expect(200);
    expect(unchanged.body).toEqual({ log: "", offset: 23 });

    await request(app.getHttpServer())
      .post("/api/logs/clear")
      .expect(200)
      .expect({ cleared: true });

    // The old offset is past the end of the truncated file.
    const cleared = await request(app.getHttpServer())
      .get("/api/logs?offset=1000")
      .expect(200);
    expect(cleared.body.log).toMatch(
      /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] === Log cleared manually ===\n$/,
    );
  });

  it("accepts a manual run and records why it failed", async () => {
    const response = await request(app.getHttpServer())
      .post("/api/run")
      .expect(202);
    expect(response.body).toEqual({ accepted: true, running: true });

    const status = await waitUntilIdle();

    expect(status.lastRun).toMatchObject({
      trigger: "manual",
      status: "failed",
      message: `Speed test executable not found: ${join(dataDir, "cfst")}`,
    });
    expect(cloudflare.listRecordIds).not.toHaveBeenCalled();
  });
});
