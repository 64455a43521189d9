/**
 * Language-model capability used by the lint report bot
 * @module src/llm/types
 */

export interface CompletionService {
  readonly name: string;
  /** Turn raw lint findings into a human-readable explanation */
  summarize(findings: string): Promise<string>;
}

export interface LLMConfig {
  apiKey: string;
  model: string;
  baseUrl?: string | undefined;
}
