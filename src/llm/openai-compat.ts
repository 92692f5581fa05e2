import OpenAI from "openai";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
  maxRetries?: number;
}

/**
 * Chat completions against any OpenAI-compatible endpoint. Used here with
 * Ollama's /v1 API; requests are non-streaming.
 */
export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      ...(config.maxRetries !== undefined ? { maxRetries: config.maxRetries } : {}),
    });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const requestParams: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      messages: [
        { role: "system", content: params.system },
        { role: "user", content: params.prompt },
      ],
      max_tokens: params.maxTokens ?? 1024,
      stream: false,
    };

    const response = await this.client.chat.completions.create(requestParams);
    return toResponse(response);
  }
}

function toResponse(response: OpenAI.ChatCompletion): LLMResponse {
  const choice = response.choices[0];

  return {
    text: choice?.message.content ?? null,
    stopReason: choice?.finish_reason === "length" ? "max_tokens" : "end_turn",
    usage: {
      inputTokens: response.usage?.prompt_tokens ?? null,
      outputTokens: response.usage?.completion_tokens ?? null,
    },
  };
}
