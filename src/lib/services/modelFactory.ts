import type { LLMProvider } from "@/lib/core/interfaces";
import { DashScopeService } from "./dashscope";
import { configService } from "./config";

/**
 * ModelFactory provides the review model for the application.
 * The API key is passed explicitly per call; nothing is cached between runs.
 */
export class ModelFactory {
  /**
   * Review provider configured from LLM_API_URL / LLM_MODEL.
   * An explicit apiKey wins over LLM_API_KEY.
   */
  static getReviewProvider(apiKey?: string): LLMProvider {
    const llm = configService.getLLMConfig();
    return new DashScopeService(apiKey || llm.apiKey, llm.apiUrl, llm.model);
  }
}
