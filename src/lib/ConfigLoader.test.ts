/**
 * Unit tests for ConfigLoader
 */

import * as fs from "fs";
import * as path from "path";
import { CONFIG_FILE_NAME, ConfigLoader } from "./ConfigLoader";
import { LOG_LEVELS } from "../interfaces/ILogger";
import { ValidationError } from "../types";
import { makeTempDir, removeDir } from "./testHelpers";

describe("ConfigLoader", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTempDir("config");
  });

  afterEach(() => {
    removeDir(cwd);
  });

  const writeConfig = (content: unknown, name = CONFIG_FILE_NAME) => {
    fs.writeFileSync(path.join(cwd, name), JSON.stringify(content));
  };

  describe("loadConfig", () => {
    it("should use defaults when no config file exists", async () => {
      const config = await ConfigLoader.loadConfig({}, cwd);

      expect(config).toEqual({
        copy: {
          bufferSize: 1048576,
          maxConcurrentTransfers: 16,
          exclusions: [],
        },
        security: {
          workspaceRoot: cwd,
          blockedPaths: [".git", "node_modules"],
          blockedPatterns: [],
          readOnly: false,
        },
        logLevel: "info",
      });
    });

    it("should read the config file from the working directory", async () => {
      writeConfig({
        copy: { bufferSize: 4096, exclusions: ["*.tmp"] },
        security: { workspaceRoot: "data", readOnly: true },
        logLevel: "debug",
      });

      const config = await ConfigLoader.loadConfig({}, cwd);

      expect(config.copy).toEqual({
        bufferSize: 4096,
        maxConcurrentTransfers: 16,
        exclusions: ["*.tmp"],
      });
      expect(config.security.workspaceRoot).toBe(path.join(cwd, "data"));
      expect(config.security.readOnly).toBe(true);
      expect(config.logLevel).toBe("debug");
    });

    it("should read the file named by TREECOPY_CONFIG", async () => {
      writeConfig({ copy: { maxConcurrentTransfers: 2 } }, "custom.json");

      const config = await ConfigLoader.loadConfig(
        { TREECOPY_CONFIG: "custom.json" },
        cwd
      );

      expect(config.copy.maxConcurrentTransfers).toBe(2);
    });

    it("should fail when TREECOPY_CONFIG names a missing file", async () => {
      await expect(
        ConfigLoader.loadConfig({ TREECOPY_CONFIG: "absent.json" }, cwd)
      ).rejects.toThrow(
        `Config file not found: ${path.join(cwd, "absent.json")}`
      );
    });

    it("should let the environment override the file", async () => {
      writeConfig({ copy: { bufferSize: 4096 }, logLevel: "debug" });

      const config = await ConfigLoader.loadConfig(
        {
          TREECOPY_WORKSPACE_ROOT: "elsewhere",
          TREECOPY_BUFFER_SIZE: "512",
          TREECOPY_LOG_LEVEL: "ERROR",
        },
        cwd
      );

      expect(config.security.workspaceRoot).toBe(path.join(cwd, "elsewhere"));
      expect(config.copy.bufferSize).toBe(512);
      expect(config.logLevel).toBe("error");
    });

    it.each(["0", "-4", "1.5", "lots"])(
      "should reject TREECOPY_BUFFER_SIZE=%s",
      async (value) => {
        await expect(
          ConfigLoader.loadConfig({ TREECOPY_BUFFER_SIZE: value }, cwd)
        ).rejects.toThrow(
          `TREECOPY_BUFFER_SIZE must be a positive integer, got "${value}"`
        );
      }
    );

    it("should reject an unknown TREECOPY_LOG_LEVEL", async () => {
      await expect(
        ConfigLoader.loadConfig({ TREECOPY_LOG_LEVEL: "loud" }, cwd)
      ).rejects.toThrow(
        'TREECOPY_LOG_LEVEL must be one of debug, info, warn, error, got "loud"'
      );
    });
  });

  describe("parseConfigFile", () => {
    it("should accept an empty object", () => {
      expect(ConfigLoader.parseConfigFile("{}")).toEqual({});
    });

    it("should reject invalid JSON", () => {
      expect(() => ConfigLoader.parseConfigFile("{ nope")).toThrow(
        /^Invalid JSON in treecopy-config\.json: /
      );
    });

    it("should reject unknown keys", () => {
      expect(() =>
        ConfigLoader.parseConfigFile('{"extra": 1}', "settings.json")
      ).toThrow(
        "Invalid configuration in settings.json: (root): Unrecognized key(s) in object: 'extra'"
      );
    });

    it("should name the offending field", () => {
      expect(() =>
        ConfigLoader.parseConfigFile('{"copy": {"bufferSize": -1}}')
      ).toThrow(
        "Invalid configuration in treecopy-config.json: copy.bufferSize: Number must be greater than 0"
      );
    });

    it("should list the known log levels for an unknown one", () => {
      expect(() =>
        ConfigLoader.parseConfigFile('{"logLevel": "loud"}')
      ).toThrow(
        "Invalid configuration in treecopy-config.json: logLevel: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'loud'"
      );
    });

    it("should accept every known log level", () => {
      for (const level of LOG_LEVELS) {
        expect(
          ConfigLoader.parseConfigFile(JSON.stringify({ logLevel: level }))
        ).toEqual({ logLevel: level });
      }
    });

    it("should throw ValidationError", () => {
      expect(() => ConfigLoader.parseConfigFile('{"logLevel": 3}')).toThrow(
        ValidationError
      );
    });
  });
});
