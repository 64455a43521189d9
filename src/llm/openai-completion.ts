import OpenAI from "openai";
import {
  CompletionServiceError,
  errorMessage,
  getErrorStatus,
} from "../errors.ts";
import { Logger } from "../logger/mod.ts";
import { buildLintPrompt, type LintPromptOptions } from "../lint/prompt.ts";
import type { CompletionService, LLMConfig } from "./types.ts";

export const DEFAULT_COMPLETION_MODEL = "gpt-4o-mini";

/**
 * The part of the OpenAI client this service calls.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
      ): Promise<ChatCompletionResult>;
    };
  };
}

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
}

export interface OpenAICompletionOptions extends LLMConfig {
  prompt?: LintPromptOptions;
  /** Pre-built client, used instead of constructing one from apiKey */
  client?: ChatCompletionClient;
}

const log = Logger.create("llm:openai");

export class OpenAICompletionService implements CompletionService {
  readonly name = "openai";
  readonly model: string;

  private readonly client: ChatCompletionClient;
  readonly promptOptions: LintPromptOptions;

  constructor(options: OpenAICompletionOptions) {
    this.model = options.model || DEFAULT_COMPLETION_MODEL;
    this.promptOptions = options.prompt ?? {};
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
    });
  }

  /**
   * Send the findings to the model as a single system message and return
   * the first choice, trimmed. No retries.
   */
  async summarize(findings: string): Promise<string> {
    const prompt = buildLintPrompt(findings, this.promptOptions);
    log.debug("Requesting completion", {
      model: this.model,
      promptChars: prompt.length,
    });

    const startTime = Date.now();
    let completion: ChatCompletionResult;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "system", content: prompt }],
        n: 1,
      });
    } catch (error) {
      throw new CompletionServiceError(
        `Completion request failed: ${errorMessage(error)}`,
        this.name,
        getErrorStatus(error),
        error,
      );
    }

    const content = completion.choices[0]?.message.content?.trim();
    if (!content) {
      throw new CompletionServiceError(
        "Completion response contained no text",
        this.name,
      );
    }

    log.debug("Completion received", {
      model: this.model,
      durationMs: Date.now() - startTime,
    });
    return content;
  }
}
