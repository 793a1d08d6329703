import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app.config';
import { HealthCheckService } from './health/health-check.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  logger.log('🚀 Starting Duit Chat...');

  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);
  const healthService = app.get(HealthCheckService);

  logger.log(`📋 Environment: ${config.nodeEnv}`);
  logger.log(`💾 Storage driver: ${config.storageDriver}`);

  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.log(`📨 Received ${signal}. Starting graceful shutdown...`);
    healthService.prepareShutdown();
    try {
      await app.close();
      logger.log('✅ Application closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error('❌ Error during graceful shutdown', error instanceof Error ? error.stack : String(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('💥 Uncaught Exception', error.stack);
    healthService.prepareShutdown();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`💥 Unhandled Rejection: ${reason instanceof Error ? reason.stack : String(reason)}`);
    healthService.prepareShutdown();
    process.exit(1);
  });

  await app.listen(config.port, '0.0.0.0');

  logger.log(`📡 Server listening on: http://0.0.0.0:${config.port}`);
  logger.log(`💬 Chat endpoint: POST http://0.0.0.0:${config.port}/chat`);
  logger.log(`🏥 Health check: http://0.0.0.0:${config.port}/health`);
  logger.log(`💓 Keep-alive: http://0.0.0.0:${config.port}/alive`);
}

bootstrap().catch((error: unknown) => {
  console.error('💥 Failed to start application:', error);
  process.exit(1);
});
