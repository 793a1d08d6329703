import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { DialogueModule } from './dialogue/dialogue.module';
import { HealthModule } from './health/health.module';
import { StorageModule } from './storage/storage.module';

@Module({
  imports: [ConfigModule, StorageModule, DialogueModule, HealthModule],
  controllers: [AppController],
})
export class AppModule {}
