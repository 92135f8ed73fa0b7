/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Repositories
  DocumentRepository: Symbol.for("DocumentRepository"),

  // Scripture providers (multi-registration, one per version)
  ScriptureProvider: Symbol.for("ScriptureProvider"),

  // Reference data
  CommentaryLookup: Symbol.for("CommentaryLookup"),
  Lexicon: Symbol.for("Lexicon"),

  // AI Infrastructure
  LLMClient: Symbol.for("LLMClient"),
  ScriptureAnalyzer: Symbol.for("ScriptureAnalyzer"),

  // Use Cases
  LookupScriptureUseCase: Symbol.for("LookupScriptureUseCase"),
  ResolvePlaceholdersUseCase: Symbol.for("ResolvePlaceholdersUseCase"),
  ResolveDirectoryUseCase: Symbol.for("ResolveDirectoryUseCase"),
} as const;
