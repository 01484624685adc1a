import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { RecommendationEngine } from './recommendation.engine';

@Module({
  imports: [CatalogModule],
  providers: [RecommendationEngine],
  exports: [RecommendationEngine],
})
export class RecommendationsModule {}
