import "reflect-metadata";
import { container } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Persistence
import { IDocumentRepository } from "../domain/scripture/repositories/IDocumentRepository";
import { FileSystemDocumentRepository } from "../infrastructure/persistence/filesystem/FileSystemDocumentRepository";

// Scripture providers and reference data
import { IScriptureProvider } from "../domain/scripture/ports/IScriptureProvider";
import { ICommentaryLookup } from "../domain/scripture/ports/ICommentaryLookup";
import { ILexicon } from "../domain/scripture/ports/ILexicon";
import { IScriptureAnalyzer } from "../domain/scripture/ports/IScriptureAnalyzer";
import { ScriptureProviderRegistry } from "../domain/scripture/services/ScriptureProviderRegistry";
import { EsvScriptureProvider } from "../infrastructure/scripture/EsvScriptureProvider";
import { NetScriptureProvider } from "../infrastructure/scripture/NetScriptureProvider";
import { CommentariatClient } from "../infrastructure/commentary/CommentariatClient";
import { JsonLexicon } from "../infrastructure/lexicon/JsonLexicon";

// AI
import { ILLMClient, OpenAIClient } from "../infrastructure/ai/OpenAIClient";
import { OpenAIScriptureAnalyzer } from "../infrastructure/ai/OpenAIScriptureAnalyzer";

// Use Cases
import { LookupScriptureUseCase } from "../application/scripture/use-cases/LookupScriptureUseCase";
import { ResolvePlaceholdersUseCase } from "../application/scripture/use-cases/ResolvePlaceholdersUseCase";
import { ResolveDirectoryUseCase } from "../application/scripture/use-cases/ResolveDirectoryUseCase";

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations
 */
export class DIContainer {
  static initialize(): void {
    // Configuration
    container.registerSingleton<IConfig>(TYPES.Config, EnvConfig);

    // Logging
    container.register<ILogger>(TYPES.Logger, {
      useClass: PinoLogger,
    });

    // Repositories
    container.register<IDocumentRepository>(TYPES.DocumentRepository, {
      useClass: FileSystemDocumentRepository,
    });

    // Scripture providers, one registration per version
    container.register<IScriptureProvider>(TYPES.ScriptureProvider, {
      useClass: EsvScriptureProvider,
    });
    container.register<IScriptureProvider>(TYPES.ScriptureProvider, {
      useClass: NetScriptureProvider,
    });
    container.registerSingleton(ScriptureProviderRegistry);

    // Reference data
    container.register<ICommentaryLookup>(TYPES.CommentaryLookup, {
      useClass: CommentariatClient,
    });
    container.registerSingleton<ILexicon>(TYPES.Lexicon, JsonLexicon);

    // AI Infrastructure
    container.registerSingleton<ILLMClient>(TYPES.LLMClient, OpenAIClient);
    container.register<IScriptureAnalyzer>(TYPES.ScriptureAnalyzer, {
      useClass: OpenAIScriptureAnalyzer,
    });

    // Use Cases
    container.register(TYPES.LookupScriptureUseCase, {
      useClass: LookupScriptureUseCase,
    });
    container.register(TYPES.ResolvePlaceholdersUseCase, {
      useClass: ResolvePlaceholdersUseCase,
    });
    container.register(TYPES.ResolveDirectoryUseCase, {
      useClass: ResolveDirectoryUseCase,
    });
  }
}

// Initialize container on module load
DIContainer.initialize();

export { container };
