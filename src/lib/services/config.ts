/**
 * Centralized configuration service.
 * Eliminates scattered process.env calls; values are read once per process.
 */

import { DEFAULT_MODELS } from "@/config/models";

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value || "");
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface AppConfig {
  llm: {
    apiUrl: string;
    apiKey: string;
    model: string;
  };
  review: {
    // Candidates sent to the model per run; the rest is reported as truncated
    maxCandidates: number;
    // Reference text embedded in the prompt
    maxContextChars: number;
    temperature: number;
    maxTokens: number;
  };
  segment: {
    minLength: number;
  };
}

class ConfigService {
  private static instance: ConfigService;
  private config: AppConfig | null = null;

  private constructor() {}

  static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  /**
   * Drop the cached config so the next read sees the current environment.
   */
  reset(): void {
    this.config = null;
  }

  private loadConfig(): AppConfig {
    return {
      llm: {
        apiUrl: process.env.LLM_API_URL || "https://dashscope.aliyuncs.com/compatible-mode",
        apiKey: process.env.LLM_API_KEY || process.env.DASHSCOPE_API_KEY || "",
        model: process.env.LLM_MODEL || DEFAULT_MODELS.REVIEW,
      },
      review: {
        maxCandidates: parseIntOr(process.env.REVIEW_MAX_CANDIDATES, 50),
        maxContextChars: parseIntOr(process.env.REVIEW_MAX_CONTEXT_CHARS, 30000),
        temperature: parseFloatOr(process.env.REVIEW_TEMPERATURE, 0.1),
        maxTokens: parseIntOr(process.env.REVIEW_MAX_TOKENS, 2000),
      },
      segment: {
        minLength: parseIntOr(process.env.SEGMENT_MIN_LENGTH, 3),
      },
    };
  }

  getLLMConfig() {
    return this.getConfig().llm;
  }

  getReviewConfig() {
    return this.getConfig().review;
  }

  getSegmentConfig() {
    return this.getConfig().segment;
  }
}

// Export singleton instance
export const configService = ConfigService.getInstance();

// Also export the class for testing purposes
export { ConfigService };
