import { Module } from '@nestjs/common';

import { LlmModule } from '../llm/llm.module';
import { DateExtractor } from './date-extractor';
import { IntentRouter } from './intent-router.service';
import { NumberExtractor } from './number-extractor';
import { SlotExtractionService } from './slot-extraction.service';

@Module({
  imports: [LlmModule],
  providers: [NumberExtractor, DateExtractor, SlotExtractionService, IntentRouter],
  exports: [NumberExtractor, DateExtractor, SlotExtractionService, IntentRouter],
})
export class ConversationModule {}
