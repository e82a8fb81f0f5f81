import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  configFromEnv,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
} from "./config.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig();

      expect(config).toEqual({
        endpoint: CONFIG_DEFAULTS.endpoint,
        remote: false,
        waitTimeoutMs: 30000,
        logLevel: "warn",
        logJson: false,
      });
    });

    it("user config overrides system config", () => {
      const systemConfig = { backend: { endpoint: "/run/system.sock" } };
      const userConfig = { backend: { endpoint: "/run/user.sock" } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.endpoint).toBe("/run/user.sock");
    });

    it("environment overrides config files, CLI overrides environment", () => {
      const userConfig = { backend: { endpoint: "/run/user.sock", remote: false } };

      const config = resolveConfig(
        { endpoint: "localhost:9300" },
        userConfig,
        undefined,
        { endpoint: "/run/env.sock", remote: true }
      );

      expect(config.endpoint).toBe("localhost:9300");
      expect(config.remote).toBe(true);
    });

    it("ignores undefined CLI values", () => {
      const userConfig = { downloads: { waitTimeoutMs: 5000 } };

      const config = resolveConfig({ waitTimeoutMs: undefined }, userConfig);

      expect(config.waitTimeoutMs).toBe(5000);
    });

    it("applies logging settings from config", () => {
      const userConfig = { logging: { level: "debug" as const, json: true } };

      const config = resolveConfig({}, userConfig);

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("configFromEnv", () => {
    it("reads endpoint, remote flag and log level", () => {
      expect(
        configFromEnv({
          DLTRACK_ENDPOINT: "/run/env.sock",
          DLTRACK_REMOTE: "1",
          DLTRACK_LOG_LEVEL: "info",
        })
      ).toEqual({ endpoint: "/run/env.sock", remote: true, logLevel: "info" });
    });

    it("treats other remote values as false", () => {
      expect(configFromEnv({ DLTRACK_REMOTE: "no" })).toEqual({ remote: false });
    });

    it("returns nothing for an empty environment", () => {
      expect(configFromEnv({})).toEqual({});
    });

    it("rejects an unknown log level", () => {
      expect(() => configFromEnv({ DLTRACK_LOG_LEVEL: "verbose" })).toThrow(
        "DLTRACK_LOG_LEVEL must be one of debug, info, warn, error"
      );
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates a full config", () => {
      const result = ConfigFileSchema.safeParse({
        backend: { endpoint: "localhost:9300", remote: true },
        downloads: { waitTimeoutMs: 0 },
        logging: { level: "error", json: false },
      });

      expect(result.success).toBe(true);
    });

    it("validates empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("rejects negative wait timeout", () => {
      const result = ConfigFileSchema.safeParse({ downloads: { waitTimeoutMs: -1 } });

      expect(result.success).toBe(false);
    });

    it("rejects unknown keys", () => {
      const result = ConfigFileSchema.safeParse({ backend: { endpiont: "/tmp/x.sock" } });

      expect(result.success).toBe(false);
    });

    it("rejects invalid logging level", () => {
      const result = ConfigFileSchema.safeParse({ logging: { level: "verbose" } });

      expect(result.success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for non-existent file", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/path/to/config.yaml")).toBeUndefined();
    });

    it("loads and parses valid YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
backend:
  endpoint: /run/browser.sock
logging:
  level: debug
`);

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result?.backend?.endpoint).toBe("/run/browser.sock");
      expect(result?.logging?.level).toBe("debug");
    });

    it("handles empty YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({});
    });

    it("throws CONFIG_INVALID on invalid YAML syntax", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
backend:
  endpoint: [invalid
`);

      expect(() => loadConfigFile("/path/to/config.yaml")).toThrow(
        expect.objectContaining({
          code: "CONFIG_INVALID",
          details: expect.stringMatching(/^invalid YAML: /),
        })
      );
    });

    it("lists each schema issue by path", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
downloads:
  waitTimeoutMs: "soon"
`);

      expect(() => loadConfigFile("/path/to/config.yaml")).toThrow(
        expect.objectContaining({
          message: "Config file /path/to/config.yaml has errors",
          details: expect.stringMatching(/^downloads\.waitTimeoutMs: /),
        })
      );
    });
  });

  describe("loadConfig", () => {
    it("uses only the explicit file when one is given", () => {
      vi.mocked(existsSync).mockImplementation((p) => p === "/custom.yaml");
      vi.mocked(readFileSync).mockReturnValue("backend:\n  remote: true\n");

      const { config, sources } = loadConfig({}, "/custom.yaml", {});

      expect(sources).toEqual(["/custom.yaml"]);
      expect(config.remote).toBe(true);
    });

    it("fails when the explicit file is missing", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(() => loadConfig({}, "/missing.yaml", {})).toThrow(
        "Config file /missing.yaml has errors"
      );
    });

    it("falls back to defaults when no files exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      const { config, sources } = loadConfig({}, undefined, {});

      expect(sources).toEqual([]);
      expect(config.endpoint).toBe(CONFIG_DEFAULTS.endpoint);
    });
  });
});
