import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Writable } from "node:stream";
import { loadConfig, loadCredentials } from "./config";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";
import { createTempDir } from "./test-utils/fixtures";

/**
 * Startup wiring: configuration files, credentials from the environment and
 * structured logging. The harvest itself is covered in ./pipeline.
 */
describe("entry point and integration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  describe("configuration files", () => {
    it("should load a minimal config and fill in defaults", () => {
      const configPath = writeConfig(
        "minimal.yaml",
        `
artifacts:
  dir: ./papers
`,
      );

      const config = loadConfig(configPath);

      expect(config).toEqual({
        feed: { maxItems: 50 },
        target: {
          domain: "arxiv.org",
          abstractPath: "abs",
          filePath: "pdf",
          fileExtension: ".pdf",
        },
        store: { cacheDir: "./cache", format: "json" },
        artifacts: { dir: "./papers" },
        http: {
          timeoutMs: 30000,
          userAgent: "paper-harvest/1.0 (favorites harvester)",
        },
      });
    });

    it("should load every recognized option", () => {
      const configPath = writeConfig(
        "full.yaml",
        `
feed:
  maxItems: 10
target:
  domain: example.org
store:
  cacheDir: /var/cache/harvest
  cacheFile: seen.db
  format: sqlite
artifacts:
  dir: /srv/papers
http:
  timeoutMs: 1000
schedule: "*/30 * * * *"
`,
      );

      const config = loadConfig(configPath);

      expect(config.feed.maxItems).toBe(10);
      expect(config.target.domain).toBe("example.org");
      expect(config.target.filePath).toBe("pdf");
      expect(config.store).toEqual({
        cacheDir: "/var/cache/harvest",
        cacheFile: "seen.db",
        format: "sqlite",
      });
      expect(config.http.timeoutMs).toBe(1000);
      expect(config.schedule).toBe("*/30 * * * *");
    });

    it("should throw when the artifact directory is missing", () => {
      const configPath = writeConfig("no-artifacts.yaml", "feed:\n  maxItems: 5\n");

      expect(() => loadConfig(configPath)).toThrow(ConfigurationError);
      expect(() => loadConfig(configPath)).toThrow(/artifacts/);
    });

    it("should throw on a non-positive item ceiling", () => {
      const configPath = writeConfig(
        "bad-max.yaml",
        "feed:\n  maxItems: 0\nartifacts:\n  dir: ./papers\n",
      );

      expect(() => loadConfig(configPath)).toThrow(/feed\.maxItems/);
    });

    it("should throw on an unknown store format", () => {
      const configPath = writeConfig(
        "bad-format.yaml",
        "store:\n  format: csv\nartifacts:\n  dir: ./papers\n",
      );

      expect(() => loadConfig(configPath)).toThrow(/store\.format/);
    });

    it("should throw on malformed YAML", () => {
      const configPath = writeConfig("broken.yaml", "artifacts: [unclosed\n");

      expect(() => loadConfig(configPath)).toThrow("failed to parse YAML");
    });

    it("should throw when the file does not exist", () => {
      expect(() => loadConfig(join(tmpDir, "absent.yaml"))).toThrow(
        "failed to read config file",
      );
    });
  });

  describe("credentials", () => {
    const env = {
      TWITTER_CONSUMER_KEY: "test-consumer-key",
      TWITTER_CONSUMER_SECRET: "test-consumer-secret",
      TWITTER_ACCESS_TOKEN: "test-access-token",
      TWITTER_ACCESS_TOKEN_SECRET: "test-access-secret",
    };

    it("should read all four credentials", () => {
      expect(loadCredentials(env)).toEqual({
        consumerKey: "test-consumer-key",
        consumerSecret: "test-consumer-secret",
        accessToken: "test-access-token",
        accessTokenSecret: "test-access-secret",
      });
    });

    it("should name every missing credential", () => {
      const error = (() => {
        try {
          loadCredentials({ TWITTER_CONSUMER_KEY: "test-consumer-key" });
          return null;
        } catch (err) {
          return err;
        }
      })();

      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toContain("TWITTER_CONSUMER_SECRET");
        expect(error.message).toContain("TWITTER_ACCESS_TOKEN");
        expect(error.message).toContain("TWITTER_ACCESS_TOKEN_SECRET");
        expect(error.message).not.toContain("TWITTER_CONSUMER_KEY:");
      }
    });

    it("should reject empty values", () => {
      expect(() => loadCredentials({ ...env, TWITTER_ACCESS_TOKEN: "" })).toThrow(
        /TWITTER_ACCESS_TOKEN/,
      );
    });
  });

  describe("structured log output", () => {
    it("should write JSON lines with a string level and ISO time", () => {
      const chunks: Array<string> = [];
      const stream = new Writable({
        write(chunk: Buffer, _encoding: string, callback: () => void) {
          chunks.push(chunk.toString("utf-8"));
          callback();
        },
      });

      const logger = createLogger("info", stream);
      logger.info({ link: "https://example.org/abs/1234" }, "paper downloaded");

      const line: unknown = JSON.parse(chunks.join(""));
      expect(line).toMatchObject({
        level: "info",
        name: "paper-harvest",
        msg: "paper downloaded",
        link: "https://example.org/abs/1234",
      });
      expect(line).toHaveProperty(
        "time",
        expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/),
      );
    });

    it("should drop messages below the configured level", () => {
      const chunks: Array<string> = [];
      const stream = new Writable({
        write(chunk: Buffer, _encoding: string, callback: () => void) {
          chunks.push(chunk.toString("utf-8"));
          callback();
        },
      });

      const logger = createLogger("warn", stream);
      logger.info("not written");
      logger.warn("written");

      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toContain('"msg":"written"');
    });
  });
});
