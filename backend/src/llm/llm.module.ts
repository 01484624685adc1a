import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ConversationSettings } from '../config/conversation-settings.service';
import { createCompletionClient } from './completion-client.factory';
import { CompletionClient } from './completion-client';

@Module({
  providers: [
    {
      provide: CompletionClient,
      inject: [ConfigService, ConversationSettings],
      useFactory: createCompletionClient,
    },
  ],
  exports: [CompletionClient],
})
export class LlmModule {}
