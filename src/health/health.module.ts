import { Module } from '@nestjs/common';
import { IntentsModule } from '../intents/intents.module';
import { HealthCheckService } from './health-check.service';

@Module({
  imports: [IntentsModule],
  providers: [HealthCheckService],
  exports: [HealthCheckService],
})
export class HealthModule {}
