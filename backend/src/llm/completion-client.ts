import { Result } from '../common/result';

export type CompletionErrorReason = 'disabled' | 'empty_output' | 'request_failed';

export interface CompletionError {
  reason: CompletionErrorReason;
  message: string;
}

/**
 * Text generation backend. Failures come back as values; callers pick their own fallback.
 */
export abstract class CompletionClient {
  abstract readonly available: boolean;

  abstract readonly name: string;

  abstract generate(prompt: string, maxTokens: number): Promise<Result<string, CompletionError>>;

  abstract stream(
    prompt: string,
    maxTokens: number,
  ): Promise<Result<AsyncIterable<string>, CompletionError>>;
}

export const completionFailure = (cause: unknown): CompletionError => ({
  reason: 'request_failed',
  message: cause instanceof Error ? cause.message : String(cause),
});

/** Pulls the JSON body out of a reply that may be wrapped in a markdown fence. */
export const extractJsonFromMarkdown = (text: string): string => {
  let cleaned = text.trim();

  const jsonBlockMatch = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    cleaned = jsonBlockMatch[1].trim();
  }

  return cleaned.replace(/^`|`$/g, '');
};
