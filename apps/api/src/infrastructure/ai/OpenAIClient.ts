/**
 * OpenAI Client Wrapper
 *
 * Centralizes OpenAI SDK interactions behind ILLMClient so the analysis
 * pass can be tested with a fake. Requests are never retried.
 */

import OpenAI from "openai";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IConfig } from "../../shared/config/IConfig";
import { ILogger } from "../logging/ILogger";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
  max_tokens?: number;
  timeoutMs?: number;
}

/**
 * Interface for LLM clients - allows swapping providers
 */
export interface ILLMClient {
  isAvailable(): boolean;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

/**
 * OpenAI implementation of ILLMClient
 */
@injectable()
export class OpenAIClient implements ILLMClient {
  private readonly client: OpenAI | null;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {
    this.client = this.createClient();
  }

  private createClient(): OpenAI | null {
    if (!this.config.openAiApiKey) {
      this.logger.debug("No OpenAI API key found. Client will not be available.");
      return null;
    }
    return new OpenAI({
      apiKey: this.config.openAiApiKey,
      maxRetries: 0,
      timeout: this.config.analysisTimeoutMs,
    });
  }

  /**
   * Check if client is available
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * Simple chat completion
   */
  async chat(
    messages: ChatMessage[],
    options: ChatOptions = {},
  ): Promise<string> {
    if (!this.client) {
      throw new Error("OpenAI client not configured (missing API key)");
    }

    const model = options.model || this.config.openAiModel;

    try {
      const completion = await this.client.chat.completions.create(
        {
          model,
          messages,
          temperature: options.temperature ?? 0.7,
          max_tokens: options.max_tokens,
        },
        { timeout: options.timeoutMs ?? this.config.analysisTimeoutMs },
      );

      return completion.choices[0]?.message?.content || "";
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`OpenAI request failed: ${message}`, { cause: error });
    }
  }
}
