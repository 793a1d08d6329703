import { Module } from '@nestjs/common';
import { CategoryClassificationService } from '../classification/category-classification.service';
import { ParserService } from './parser.service';

/** Entity extraction, plus the categorizer it runs on every description. */
@Module({
  providers: [CategoryClassificationService, ParserService],
  exports: [CategoryClassificationService, ParserService],
})
export class ParserModule {}
