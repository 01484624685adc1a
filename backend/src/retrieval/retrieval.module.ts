import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { DatabaseModule } from '../database/database.module';
import { LlmModule } from '../llm/llm.module';
import { DocumentRelevanceFilter } from './document-relevance.filter';
import { QueryOptimizer } from './query-optimizer';
import { PgVectorRetrievalService, RetrievalService } from './retrieval.service';

@Module({
  imports: [CatalogModule, DatabaseModule, LlmModule],
  providers: [
    QueryOptimizer,
    DocumentRelevanceFilter,
    { provide: RetrievalService, useClass: PgVectorRetrievalService },
  ],
  exports: [QueryOptimizer, DocumentRelevanceFilter, RetrievalService],
})
export class RetrievalModule {}
