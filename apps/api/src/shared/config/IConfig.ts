/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables or be built by hand in tests.
 */

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;

  // Scripture providers
  readonly esvApiKey: string | undefined;
  readonly esvApiUrl: string;
  readonly netApiUrl: string;
  readonly providerTimeoutMs: number;

  // Commentary
  readonly commentaryApiUrl: string;
  readonly commentaryTimeoutMs: number;

  // AI
  readonly openAiApiKey: string | undefined;
  readonly openAiModel: string;
  readonly enableScriptureAnalysis: boolean;
  readonly analysisTimeoutMs: number;

  // Resolution
  readonly resolveConcurrency: number;
  readonly lexiconPath: string;

  // Validation
  validate(): void;
}
