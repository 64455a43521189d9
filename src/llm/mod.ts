/**
 * Language-model integration
 * @module src/llm
 */

export type { CompletionService, LLMConfig } from "./types.ts";
export {
  DEFAULT_COMPLETION_MODEL,
  OpenAICompletionService,
} from "./openai-completion.ts";
export type {
  ChatCompletionClient,
  ChatCompletionResult,
  OpenAICompletionOptions,
} from "./openai-completion.ts";
