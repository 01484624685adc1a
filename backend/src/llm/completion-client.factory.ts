import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ConversationSettings } from '../config/conversation-settings.service';
import { GroqCompletionClient, OpenAiCompletionClient } from './chat-completions.client';
import { CompletionClient } from './completion-client';
import { DisabledCompletionClient } from './disabled-completion.client';

const logger = new Logger('CompletionClientFactory');

export const createCompletionClient = (
  configService: ConfigService,
  settings: ConversationSettings,
): CompletionClient => {
  const timeoutMs = settings.collaboratorTimeoutMs;

  if (settings.completionProvider === 'groq') {
    const apiKey = configService.get<string>('GROQ_API_KEY');
    if (!apiKey) {
      logger.warn('GROQ_API_KEY is not configured. Answers will use template fallbacks.');
      return new DisabledCompletionClient();
    }

    const model = configService.get<string>('GROQ_MODEL') ?? 'llama-3.1-8b-instant';
    logger.log(`Using Groq completions with model ${model}`);
    return new GroqCompletionClient({ apiKey, model, timeoutMs });
  }

  const apiKey = configService.get<string>('OPENAI_API_KEY');
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY is not configured. Answers will use template fallbacks.');
    return new DisabledCompletionClient();
  }

  const model = configService.get<string>('OPENAI_MODEL') ?? 'gpt-4o-mini';
  logger.log(`Using OpenAI completions with model ${model}`);
  return new OpenAiCompletionClient({ apiKey, model, timeoutMs });
};
