/** Provider-agnostic completion types and interface. */

export interface LLMUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

export interface LLMResponse {
  text: string | null;
  stopReason: "end_turn" | "max_tokens";
  usage: LLMUsage;
}

/** One single-turn completion: a system prompt and one user prompt. */
export interface LLMChatParams {
  model: string;
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: LLMChatParams): Promise<LLMResponse>;
}
