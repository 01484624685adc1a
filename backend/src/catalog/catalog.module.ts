import { Module } from '@nestjs/common';

import { CottageCatalog } from './cottage-catalog.service';

@Module({
  providers: [CottageCatalog],
  exports: [CottageCatalog],
})
export class CatalogModule {}
