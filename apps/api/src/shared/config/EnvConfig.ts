import path from "path";
import { injectable } from "tsyringe";
import { IConfig } from "./IConfig";

const DEFAULT_LEXICON_PATH = path.join(
  __dirname,
  "..",
  "..",
  "..",
  "data",
  "greek-lexicon.json",
);

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup.
 * Provider credentials are optional here; a missing key is reported
 * per request by the provider that needs it.
 */
@injectable()
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;

  readonly esvApiKey: string | undefined;
  readonly esvApiUrl: string;
  readonly netApiUrl: string;
  readonly providerTimeoutMs: number;

  readonly commentaryApiUrl: string;
  readonly commentaryTimeoutMs: number;

  readonly openAiApiKey: string | undefined;
  readonly openAiModel: string;
  readonly enableScriptureAnalysis: boolean;
  readonly analysisTimeoutMs: number;

  readonly resolveConcurrency: number;
  readonly lexiconPath: string;

  constructor() {
    const env = process.env;

    this.port = Number(env.PORT || "3001");
    this.nodeEnv = env.NODE_ENV || "development";

    this.esvApiKey = optional(env.ESV_API_KEY);
    this.esvApiUrl = env.ESV_API_URL || "https://api.esv.org/v3/passage/text/";
    this.netApiUrl = env.NET_API_URL || "https://labs.bible.org/api/";
    this.providerTimeoutMs = Number(env.PROVIDER_TIMEOUT_MS || "15000");

    this.commentaryApiUrl =
      env.COMMENTARY_API_URL ||
      "https://commentariat-production.up.railway.app";
    this.commentaryTimeoutMs = Number(env.COMMENTARY_TIMEOUT_MS || "30000");

    this.openAiApiKey = optional(env.OPENAI_API_KEY);
    this.openAiModel = env.OPENAI_MODEL || "gpt-4o";
    this.enableScriptureAnalysis = env.ENABLE_SCRIPTURE_ANALYSIS === "true";
    this.analysisTimeoutMs = Number(env.ANALYSIS_TIMEOUT_MS || "30000");

    this.resolveConcurrency = Number(env.RESOLVE_CONCURRENCY || "4");
    this.lexiconPath = env.LEXICON_PATH || DEFAULT_LEXICON_PATH;

    this.validate();
  }

  validate(): void {
    if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new Error(`Invalid PORT: ${this.port}`);
    }

    const positive = [
      { name: "PROVIDER_TIMEOUT_MS", value: this.providerTimeoutMs },
      { name: "COMMENTARY_TIMEOUT_MS", value: this.commentaryTimeoutMs },
      { name: "ANALYSIS_TIMEOUT_MS", value: this.analysisTimeoutMs },
      { name: "RESOLVE_CONCURRENCY", value: this.resolveConcurrency },
    ];

    const invalid = positive.filter(
      (p) => !Number.isInteger(p.value) || p.value < 1,
    );

    if (invalid.length > 0) {
      throw new Error(
        `Invalid numeric environment variables: ${invalid.map((i) => i.name).join(", ")}`,
      );
    }
  }
}
