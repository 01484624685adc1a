import { Module } from '@nestjs/common';

import { ConversationModule } from '../conversation/conversation.module';
import { DatabaseModule } from '../database/database.module';
import { LlmModule } from '../llm/llm.module';
import { PricingModule } from '../pricing/pricing.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { SessionsModule } from '../sessions/sessions.module';
import { AnswerCleaner } from './answer-cleaner';
import { ChatController } from './chat.controller';
import { ChatOrchestrator } from './chat-orchestrator.service';
import { ResponseGenerator } from './response-generator.service';

@Module({
  imports: [
    ConversationModule,
    DatabaseModule,
    LlmModule,
    PricingModule,
    RecommendationsModule,
    RetrievalModule,
    SessionsModule,
  ],
  controllers: [ChatController],
  providers: [AnswerCleaner, ResponseGenerator, ChatOrchestrator],
  exports: [ChatOrchestrator],
})
export class ChatModule {}
