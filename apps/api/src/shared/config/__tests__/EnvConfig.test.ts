import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { EnvConfig } from "../EnvConfig";

describe("EnvConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { NODE_ENV: "test" };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should fall back to defaults", () => {
    const config = new EnvConfig();

    expect(config.port).toBe(3001);
    expect(config.esvApiKey).toBeUndefined();
    expect(config.esvApiUrl).toBe("https://api.esv.org/v3/passage/text/");
    expect(config.netApiUrl).toBe("https://labs.bible.org/api/");
    expect(config.providerTimeoutMs).toBe(15000);
    expect(config.enableScriptureAnalysis).toBe(false);
    expect(config.resolveConcurrency).toBe(4);
    expect(config.lexiconPath.endsWith("greek-lexicon.json")).toBe(true);
  });

  it("should read values from the environment", () => {
    process.env.ESV_API_KEY = "  test-key  ";
    process.env.OPENAI_API_KEY = " ";
    process.env.ENABLE_SCRIPTURE_ANALYSIS = "true";
    process.env.RESOLVE_CONCURRENCY = "8";
    process.env.LEXICON_PATH = "/data/lexicon.json";

    const config = new EnvConfig();

    expect(config.esvApiKey).toBe("test-key");
    expect(config.openAiApiKey).toBeUndefined();
    expect(config.enableScriptureAnalysis).toBe(true);
    expect(config.resolveConcurrency).toBe(8);
    expect(config.lexiconPath).toBe("/data/lexicon.json");
  });

  it("should reject an invalid port", () => {
    process.env.PORT = "70000";

    expect(() => new EnvConfig()).toThrow("Invalid PORT: 70000");
  });

  it("should name every invalid numeric variable", () => {
    process.env.PROVIDER_TIMEOUT_MS = "soon";
    process.env.RESOLVE_CONCURRENCY = "0";

    expect(() => new EnvConfig()).toThrow(
      "Invalid numeric environment variables: PROVIDER_TIMEOUT_MS, RESOLVE_CONCURRENCY",
    );
  });
});
