export const REASONING_CLIENT = 'REASONING_CLIENT';

export interface CompletionOptions {
  /** Ask the service for a JSON-only answer. */
  json?: boolean;
  signal?: AbortSignal;
}

/**
 * Text-completion service behind the semantic extraction stage.
 */
export interface ReasoningClient {
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
