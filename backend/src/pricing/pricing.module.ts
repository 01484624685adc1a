import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { ConversationModule } from '../conversation/conversation.module';
import { CapacityQueryHandler } from './capacity-query.handler';
import { PricingCalculator } from './pricing-calculator.service';
import { PricingQueryHandler } from './pricing-query.handler';

@Module({
  imports: [CatalogModule, ConversationModule],
  providers: [PricingCalculator, PricingQueryHandler, CapacityQueryHandler],
  exports: [PricingCalculator, PricingQueryHandler, CapacityQueryHandler],
})
export class PricingModule {}
