import { Logger } from "@nestjs/common";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { getEnvOrFile, resolveEnvFileVariables } from "./env-file";

describe("env-file utilities", () => {
  const testDir = join(tmpdir(), "edgepick-env-file-test");

  beforeAll(() => {
    if (!existsSync(testDir)) {
      mkdirSync(testDir, { recursive: true });
    }
  });

  afterAll(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    delete process.env.TEST_VAR;
    delete process.env.TEST_VAR_FILE;
    delete process.env.CLOUDFLARE_API_KEY;
    delete process.env.CLOUDFLARE_API_KEY_FILE;
    delete process.env.CLOUDFLARE_EMAIL;
    delete process.env.CLOUDFLARE_EMAIL_FILE;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("getEnvOrFile", () => {
    it("returns the direct value when no _FILE variant is set", () => {
      process.env.TEST_VAR = "direct-value";

      expect(getEnvOrFile("TEST_VAR")).toBe("direct-value");
    });

    it("returns undefined when neither variant is set", () => {
      expect(getEnvOrFile("TEST_VAR", { required: true })).toBeUndefined();
    });

    it("reads and trims the file named by the _FILE variant", () => {
      const filePath = join(testDir, "test-whitespace.txt");
      writeFileSync(filePath, "  secret-with-whitespace  \n\n");
      process.env.TEST_VAR_FILE = filePath;

      expect(getEnvOrFile("TEST_VAR")).toBe("secret-with-whitespace");
    });

    it("prefers the _FILE variant over the direct value", () => {
      const filePath = join(testDir, "test-priority.txt");
      writeFileSync(filePath, "file-value");
      process.env.TEST_VAR = "direct-value";
      process.env.TEST_VAR_FILE = filePath;

      expect(getEnvOrFile("TEST_VAR")).toBe("file-value");
    });

    it("returns undefined when _FILE points to a missing file", () => {
      process.env.TEST_VAR_FILE = join(testDir, "missing.txt");

      expect(getEnvOrFile("TEST_VAR")).toBeUndefined();
    });
  });

  describe("resolveEnvFileVariables", () => {
    it("loads the DNS API key from its secret file", () => {
      const filePath = join(testDir, "cf-key.txt");
      writeFileSync(filePath, "test-secret\n");
      process.env.CLOUDFLARE_API_KEY_FILE = filePath;

      resolveEnvFileVariables();

      expect(process.env.CLOUDFLARE_API_KEY).toBe("test-secret");
    });

    it("does not overwrite values that are already set", () => {
      const filePath = join(testDir, "cf-email.txt");
      writeFileSync(filePath, "file@example.com");
      process.env.CLOUDFLARE_EMAIL = "ops@example.com";
      process.env.CLOUDFLARE_EMAIL_FILE = filePath;

      resolveEnvFileVariables();

      expect(process.env.CLOUDFLARE_EMAIL).toBe("ops@example.com");
    });

    it("warns when the DNS API key is set in neither form", () => {
      const warn = jest
        .spyOn(Logger.prototype, "warn")
        .mockImplementation(() => undefined);

      resolveEnvFileVariables();

      expect(warn).toHaveBeenCalledWith(
        "Neither CLOUDFLARE_API_KEY nor CLOUDFLARE_API_KEY_FILE is set",
      );
    });

    it("does not warn about the API key when it is already set", () => {
      const warn = jest
        .spyOn(Logger.prototype, "warn")
        .mockImplementation(() => undefined);
      process.env.CLOUDFLARE_API_KEY = "test-secret";

      resolveEnvFileVariables();

      expect(warn).not.toHaveBeenCalled();
    });
  });
});
