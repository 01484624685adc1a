import { Logger } from '@nestjs/common';
import OpenAI from 'openai';

import { err, ok, Result, settle } from '../common/result';
import { CompletionClient, CompletionError, completionFailure } from './completion-client';

export interface ChatCompletionsOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  baseURL?: string;
}

/** Any backend that speaks the OpenAI chat completions protocol. */
export abstract class ChatCompletionsClient extends CompletionClient {
  protected readonly logger = new Logger(this.constructor.name);
  private readonly openai: OpenAI;
  readonly available = true;

  protected constructor(private readonly options: ChatCompletionsOptions) {
    super();
    // One attempt per call; the SDK's own timeout aborts the request when settle gives up.
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
  }

  get model(): string {
    return this.options.model;
  }

  async generate(prompt: string, maxTokens: number): Promise<Result<string, CompletionError>> {
    const response = await settle(
      this.openai.chat.completions.create({
        model: this.options.model,
        messages: [
          {
            role: 'system',
            content: prompt,
          },
        ],
        temperature: this.options.temperature ?? 0.3,
        max_tokens: maxTokens,
      }),
      this.options.timeoutMs,
      completionFailure,
    );

    if (!response.ok) {
      this.logger.error(`${this.name} completion failed: ${response.error.message}`);
      return response;
    }

    const output = response.value.choices[0]?.message?.content;
    if (!output) {
      return err({ reason: 'empty_output', message: `No output from ${this.name}` });
    }

    return ok(output.trim());
  }

  async stream(
    prompt: string,
    maxTokens: number,
  ): Promise<Result<AsyncIterable<string>, CompletionError>> {
    const response = await settle(
      this.openai.chat.completions.create({
        model: this.options.model,
        messages: [
          {
            role: 'system',
            content: prompt,
          },
        ],
        temperature: this.options.temperature ?? 0.3,
        max_tokens: maxTokens,
        stream: true,
      }),
      this.options.timeoutMs,
      completionFailure,
    );

    if (!response.ok) {
      this.logger.error(`${this.name} stream failed to start: ${response.error.message}`);
      return response;
    }

    const chunks = response.value;
    async function* text(): AsyncGenerator<string> {
      for await (const chunk of chunks) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    }

    return ok(text());
  }
}

export class OpenAiCompletionClient extends ChatCompletionsClient {
  readonly name = 'OpenAI';

  constructor(options: Omit<ChatCompletionsOptions, 'baseURL'>) {
    super(options);
  }
}

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export class GroqCompletionClient extends ChatCompletionsClient {
  readonly name = 'Groq';

  constructor(options: Omit<ChatCompletionsOptions, 'baseURL'>) {
    super({ ...options, baseURL: GROQ_BASE_URL });
  }
}
