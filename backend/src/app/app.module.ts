import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { CatalogModule } from '../catalog/catalog.module';
import { ChatModule } from '../chat/chat.module';
import { SettingsModule } from '../config/settings.module';
import { ConversationModule } from '../conversation/conversation.module';
import { DatabaseModule } from '../database/database.module';
import { LlmModule } from '../llm/llm.module';
import { LoggingModule } from '../logging/logging.module';
import { PricingModule } from '../pricing/pricing.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { SessionsModule } from '../sessions/sessions.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    SettingsModule,
    LoggingModule,
    DatabaseModule,
    LlmModule,
    CatalogModule,
    ConversationModule,
    PricingModule,
    RecommendationsModule,
    RetrievalModule,
    SessionsModule,
    ChatModule,
  ],
})
export class AppModule {}
