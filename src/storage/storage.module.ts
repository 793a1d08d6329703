import { Global, Logger, Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { FinanceStore } from './finance-store';
import { InMemoryFinanceStore } from './in-memory-finance-store';
import { SupabaseFinanceStore } from './supabase-finance-store';

@Global()
@Module({
  providers: [
    {
      provide: FinanceStore,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): FinanceStore => {
        const logger = new Logger('StorageModule');
        if (config.storageDriver === 'supabase' && config.supabaseUrl && config.supabaseKey) {
          logger.log('Using Supabase storage');
          return SupabaseFinanceStore.connect(config.supabaseUrl, config.supabaseKey);
        }
        logger.warn('Using in-memory storage; records are lost on restart');
        return new InMemoryFinanceStore();
      },
    },
  ],
  exports: [FinanceStore],
})
export class StorageModule {}
