import { ConfigService } from '@nestjs/config';

import { buildSettings } from '../testing/fixtures';
import { GroqCompletionClient, OpenAiCompletionClient } from './chat-completions.client';
import { createCompletionClient } from './completion-client.factory';
import { extractJsonFromMarkdown } from './completion-client';
import { DisabledCompletionClient } from './disabled-completion.client';

describe('createCompletionClient', () => {
  it('falls back to the disabled client without an API key', async () => {
    const client = createCompletionClient(new ConfigService({}), buildSettings());

    expect(client).toBeInstanceOf(DisabledCompletionClient);
    expect(client.available).toBe(false);

    const result = await client.generate('hello', 10);
    expect(result).toEqual({
      ok: false,
      error: { reason: 'disabled', message: 'No completion backend is configured' },
    });
  });

  it('builds an OpenAI client by default', () => {
    const client = createCompletionClient(
      new ConfigService({ OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: 'test-model' }),
      buildSettings(),
    );

    expect(client).toBeInstanceOf(OpenAiCompletionClient);
    expect(client.available).toBe(true);
    expect(client.name).toBe('OpenAI');
  });

  it('builds a Groq client when the provider asks for it', () => {
    const client = createCompletionClient(
      new ConfigService({ GROQ_API_KEY: 'test-secret' }),
      buildSettings({ LLM_PROVIDER: 'groq' }),
    );

    expect(client).toBeInstanceOf(GroqCompletionClient);
    expect(client instanceof GroqCompletionClient && client.model).toBe('llama-3.1-8b-instant');
  });

  it('does not use the OpenAI key for Groq', () => {
    const client = createCompletionClient(
      new ConfigService({ OPENAI_API_KEY: 'test-secret' }),
      buildSettings({ LLM_PROVIDER: 'groq' }),
    );

    expect(client).toBeInstanceOf(DisabledCompletionClient);
  });
});

describe('extractJsonFromMarkdown', () => {
  it('unwraps fenced json', () => {
    expect(extractJsonFromMarkdown('```json\n{"guests": 4}\n```')).toBe('{"guests": 4}');
  });

  it('leaves bare json alone', () => {
    expect(extractJsonFromMarkdown(' {"guests": 4} ')).toBe('{"guests": 4}');
  });
});
