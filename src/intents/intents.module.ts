import { Module } from '@nestjs/common';
import { IntentCatalogService } from './intent-catalog.service';
import { IntentClassifierService } from './intent-classifier.service';

@Module({
  providers: [IntentCatalogService, IntentClassifierService],
  exports: [IntentCatalogService, IntentClassifierService],
})
export class IntentsModule {}
