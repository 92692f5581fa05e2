import { parseAnalysis } from "./parser.js";
import { buildAnalysisPrompt, SYSTEM_PROMPT } from "./prompt.js";
import {
  DEFAULT_CATEGORY,
  DEFAULT_PRIORITY,
  FAILED_SUMMARY,
  type ProcessedResult,
} from "./types.js";
import { InferenceError, MalformedReplyError, extractMessage } from "../utils/errors.js";
import type { LLMProvider } from "../llm/provider.js";
import type { NormalizedMessage } from "../mail/types.js";
import type { Logger } from "../utils/logger.js";

export interface MessageProcessorConfig {
  model: string;
  maxTokens: number;
  /** Body characters embedded in the prompt. */
  promptBodyChars: number;
}

export class MessageProcessor {
  constructor(
    private provider: LLMProvider,
    private config: MessageProcessorConfig,
    private logger: Logger
  ) {}

  /**
   * Analyze each message in turn. The result list matches `messages` index
   * for index; a message that cannot be analyzed gets a placeholder result.
   */
  async process(messages: NormalizedMessage[]): Promise<ProcessedResult[]> {
    const results: ProcessedResult[] = [];
    for (const [index, message] of messages.entries()) {
      this.logger.info(
        { messageId: message.id, position: index + 1, total: messages.length },
        "Analyzing message"
      );
      results.push(await this.processMessage(message));
    }
    return results;
  }

  async processMessage(message: NormalizedMessage): Promise<ProcessedResult> {
    const base = {
      id: message.id,
      subject: message.subject,
      sender: message.sender,
      date: message.date,
    };

    try {
      const reply = await this.complete(
        message.id,
        buildAnalysisPrompt(message, this.config.promptBodyChars)
      );
      const analysis = parseAnalysis(reply);

      if (analysis.missing.length > 0 || analysis.invalid.length > 0) {
        this.logger.warn(
          { messageId: message.id, missing: analysis.missing, invalid: analysis.invalid },
          "Model reply incomplete, using defaults for some fields"
        );
      }

      return {
        ...base,
        category: analysis.category,
        priority: analysis.priority,
        summary: analysis.summary,
        replyNeeded: analysis.replyNeeded,
        actionItems: analysis.actionItems,
      };
    } catch (err) {
      if (!(err instanceof InferenceError) && !(err instanceof MalformedReplyError)) {
        throw err;
      }
      this.logger.error({ messageId: message.id, error: err }, "Message analysis failed");
      return {
        ...base,
        category: DEFAULT_CATEGORY,
        priority: DEFAULT_PRIORITY,
        summary: FAILED_SUMMARY,
        replyNeeded: false,
        actionItems: [],
        error: err.message,
      };
    }
  }

  private async complete(messageId: string, prompt: string): Promise<string> {
    let text: string | null;
    try {
      const response = await this.provider.chat({
        model: this.config.model,
        system: SYSTEM_PROMPT,
        prompt,
        maxTokens: this.config.maxTokens,
      });
      this.logger.debug(
        { messageId, provider: this.provider.name, usage: response.usage },
        "Model reply received"
      );
      if (response.stopReason === "max_tokens") {
        this.logger.warn(
          { messageId, model: this.config.model, maxTokens: this.config.maxTokens },
          "Model reply was cut at max_tokens"
        );
      }
      text = response.text;
    } catch (err) {
      throw new InferenceError(`Inference request failed: ${extractMessage(err)}`, { cause: err });
    }

    if (!text || !text.trim()) {
      throw new MalformedReplyError("Model returned an empty reply", text ?? "");
    }
    return text;
  }
}
