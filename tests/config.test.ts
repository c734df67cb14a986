import { describe, it, expect } from "vitest";
import * as path from "path";
import { ConfigError, loadBotConfig, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("uses defaults when only the key is set", () => {
    const config = loadConfig({ GEMINI_API_KEY: "test-secret" });
    expect(config).toEqual({
      geminiApiKey: "test-secret",
      textModel: "gemini-2.5-flash",
      imageModel: "imagen-3.0",
      concurrency: 3,
      textTimeoutMs: 8000,
      imageTimeoutMs: 10000,
      maxRegenerations: 0,
      outputDir: path.resolve("output"),
      configErrors: [],
    });
  });

  it("accepts GOOGLE_API_KEY as a fallback", () => {
    expect(loadConfig({ GOOGLE_API_KEY: "test-secret" }).geminiApiKey).toBe("test-secret");
  });

  it("records a missing key instead of throwing", () => {
    const config = loadConfig({});
    expect(config.geminiApiKey).toBeNull();
    expect(config.configErrors).toEqual([
      "GEMINI_API_KEY is not set. Add it to .env or set it as an environment variable.",
    ]);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      GEMINI_API_KEY: "test-secret",
      CAMPAIGN_IMAGE_MODEL: "imagen-4.0",
      CAMPAIGN_CONCURRENCY: "10",
      CAMPAIGN_CONTENT_MAX_REGENERATIONS: "2",
      CAMPAIGN_OUTPUT_DIR: "/tmp/campaigns",
    });
    expect(config.imageModel).toBe("imagen-4.0");
    expect(config.concurrency).toBe(10);
    expect(config.maxRegenerations).toBe(2);
    expect(config.outputDir).toBe(path.resolve("/tmp/campaigns"));
  });

  it("rejects out-of-range numbers", () => {
    expect(() => loadConfig({ CAMPAIGN_CONCURRENCY: "11" })).toThrow(
      'Invalid CAMPAIGN_CONCURRENCY: "11". Must be an integer between 1 and 10.'
    );
    expect(() => loadConfig({ CAMPAIGN_CONTENT_MAX_REGENERATIONS: "1.5" })).toThrow(ConfigError);
  });

  it("rejects an unknown image model", () => {
    expect(() => loadConfig({ CAMPAIGN_IMAGE_MODEL: "dalle" })).toThrow(
      'Invalid CAMPAIGN_IMAGE_MODEL: "dalle". Must be one of: imagen-3.0, imagen-4.0.'
    );
  });
});

describe("loadBotConfig", () => {
  it("requires a bot token", () => {
    expect(() => loadBotConfig({})).toThrow(ConfigError);
  });

  it("parses authorized chats", () => {
    expect(
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", TELEGRAM_AUTHORIZED_CHATS: "123, -456,," })
    ).toEqual({ botToken: "test-token", authorizedChats: [123, -456] });
  });

  it("rejects a non-numeric chat id", () => {
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", TELEGRAM_AUTHORIZED_CHATS: "abc" })).toThrow(
      'Invalid chat ID in TELEGRAM_AUTHORIZED_CHATS: "abc". Must be a number.'
    );
  });
});
