import { Test, TestingModule } from "@nestjs/testing";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { RunCoordinatorService } from "./speedtest/run-coordinator.service";
import type { RunRecord } from "./speedtest/speedtest.types";

describe("AppController", () => {
  let appController: AppController;
  let coordinator: { isRunning: jest.Mock; getLastRun: jest.Mock };

  beforeEach(async () => {
    coordinator = {
      isRunning: jest.fn().mockReturnValue(false),
      getLastRun: jest.fn().mockReturnValue(null),
    };

    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        {
          provide: RunCoordinatorService,
          useValue: coordinator,
        },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  describe("health check", () => {
    it("should return basic health status", () => {
      const result = appController.getHealth();

      expect(result).toHaveProperty("status", "ok");
      expect(result).toHaveProperty("timestamp");
      expect(result).toHaveProperty("uptime");
      expect(result).not.toHaveProperty("run");
    });

    it("should include run state in the detailed status", () => {
      const lastRun: RunRecord = {
        trigger: "manual",
        startedAt: "2026-01-01T00:00:00.000Z",
        finishedAt: "2026-01-01T00:01:00.000Z",
        status: "failed",
        message: "No target domains configured",
        endpoints: [],
      };
      coordinator.isRunning.mockReturnValue(true);
      coordinator.getLastRun.mockReturnValue(lastRun);

      const result = appController.getHealth("true");

      expect(result).toMatchObject({
        status: "ok",
        version: "1.0.0",
        run: {
          running: true,
          lastStatus: "failed",
          lastFinishedAt: "2026-01-01T00:01:00.000Z",
        },
      });
    });
  });
});
