import { Module } from '@nestjs/common';
import { ParserModule } from '../parser/parser.module';
import { ReportsModule } from '../reports/reports.module';
import { ResponseFormatterService } from './response-formatter.service';

@Module({
  imports: [ParserModule, ReportsModule],
  providers: [ResponseFormatterService],
  exports: [ResponseFormatterService],
})
export class ResponsesModule {}
