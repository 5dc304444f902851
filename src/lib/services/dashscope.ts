// DASHSCOPE SERVICE
//
// LLM API client for the ghost-segment review.
// Talks to any OpenAI-compatible /v1/chat/completions endpoint; the default base URL
// is DashScope's compatible mode.

import type { GenerateOptions, GenerateResult, LLMProvider } from "@/lib/core/interfaces";
import { DEFAULT_MODELS } from "@/config/models";
import { ExternalServiceError } from "@/lib/utils/errors";

export const DEFAULT_BASE_URL = "https://dashscope.aliyuncs.com/compatible-mode";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Provider error message from a failed response body:
 * { error: { message } } (OpenAI style), { message } (DashScope native), or the raw text.
 */
export function extractProviderMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      if (isRecord(parsed.error) && typeof parsed.error.message === "string") {
        return parsed.error.message;
      }
      if (typeof parsed.message === "string") {
        return parsed.message;
      }
    }
  } catch {
    // not JSON, fall through to the raw body
  }
  return body.trim();
}

function readCompletion(data: unknown): GenerateResult {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    throw new ExternalServiceError("DashScope", "Response has no choices");
  }
  const [choice] = data.choices;
  const content = isRecord(choice) && isRecord(choice.message) ? choice.message.content : undefined;
  if (typeof content !== "string") {
    throw new ExternalServiceError("DashScope", "Response has no message content");
  }

  const result: GenerateResult = {
    content: content
      .replace(/<think>.*?<\/think>/gs, "")
      .trim(),
  };

  const usage = data.usage;
  if (
    isRecord(usage) &&
    typeof usage.prompt_tokens === "number" &&
    typeof usage.completion_tokens === "number" &&
    typeof usage.total_tokens === "number"
  ) {
    result.tokenUsage = {
      prompt: usage.prompt_tokens,
      completion: usage.completion_tokens,
      total: usage.total_tokens,
    };
  }

  return result;
}

export class DashScopeService implements LLMProvider {
  private apiKey: string;
  private baseUrl: string;
  private model: string;

  constructor(apiKey: string, baseUrl?: string, model: string = DEFAULT_MODELS.REVIEW) {
    this.apiKey = apiKey;
    const url = baseUrl || DEFAULT_BASE_URL;
    // Remove trailing slash to prevent double slash in URL
    this.baseUrl = url.endsWith("/") ? url.slice(0, -1) : url;
    this.model = model;
  }

  /**
   * Single chat completion. Not retried.
   * @throws ExternalServiceError on a non-2xx response, carrying status and provider message.
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResult> {
    const messages = [
      ...(options.systemPrompt ? [{ role: "system", content: options.systemPrompt }] : []),
      { role: "user", content: prompt },
    ];

    const payload = {
      model: this.model,
      messages,
      temperature: options.temperature ?? 0.1,
      ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
    };

    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const providerMessage = extractProviderMessage(await response.text());
      throw new ExternalServiceError(
        "DashScope",
        `HTTP ${response.status}: ${providerMessage}`,
        response.status,
        providerMessage
      );
    }

    const data: unknown = await response.json();
    return readCompletion(data);
  }

  getName(): string {
    return "DashScopeService";
  }

  getModel(): string {
    return this.model;
  }
}
