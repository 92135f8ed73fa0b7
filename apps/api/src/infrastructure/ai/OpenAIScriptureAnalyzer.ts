import { inject, injectable } from "tsyringe";
import { buildScriptureAnalysisMessage, SCRIPTURE_ANALYSIS_PROMPT } from "../../config/prompts";
import { TYPES } from "../../di/types";
import { IScriptureAnalyzer } from "../../domain/scripture/ports/IScriptureAnalyzer";
import { IConfig } from "../../shared/config/IConfig";
import { ILogger } from "../logging/ILogger";
import { ILLMClient } from "./OpenAIClient";

/**
 * Scripture analysis through the LLM client
 *
 * Adds poetry blocks and divine-name tags. Disabled unless
 * ENABLE_SCRIPTURE_ANALYSIS is set and a key is configured. Every failure
 * resolves to the input markup.
 */
@injectable()
export class OpenAIScriptureAnalyzer implements IScriptureAnalyzer {
  constructor(
    @inject(TYPES.LLMClient) private readonly llm: ILLMClient,
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {}

  async analyze(markup: string, referenceLabel: string): Promise<string> {
    if (!this.config.enableScriptureAnalysis || !this.llm.isAvailable()) {
      return markup;
    }

    try {
      const result = await this.llm.chat(
        [
          { role: "system", content: SCRIPTURE_ANALYSIS_PROMPT },
          {
            role: "user",
            content: buildScriptureAnalysisMessage(referenceLabel, markup),
          },
        ],
        { temperature: 0, max_tokens: 4096 },
      );

      const trimmed = result.trim();
      if (!trimmed) {
        this.logger.warn("Scripture analysis returned nothing", { reference: referenceLabel });
        return markup;
      }

      this.logger.debug("Scripture analysis applied", {
        reference: referenceLabel,
        poetry: trimmed.includes("\\begin{poetry}"),
        nameTags: trimmed.includes("\\name{"),
      });
      return trimmed;
    } catch (error) {
      this.logger.warn("Scripture analysis failed; using untransformed markup", {
        reference: referenceLabel,
        reason: error instanceof Error ? error.message : String(error),
      });
      return markup;
    }
  }
}
