import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { IntentCatalogService } from '../intents/intent-catalog.service';
import { FinanceStore } from '../storage/finance-store';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'shutting_down';
  timestamp: string;
  uptime: number;
  uptimeFormatted: string;
  environment: string;
  memory: MemoryUsage;
}

export interface MemoryUsage {
  rss: number;
  heapUsed: number;
  heapTotal: number;
  heapPercent: number;
}

export interface DetailedHealth extends HealthStatus {
  services: {
    storage: boolean;
    intents: boolean;
    memory: boolean;
  };
  overallHealth: 'healthy' | 'degraded';
}

export interface KeepAlive {
  alive: true;
  timestamp: string;
  uptime: number;
  pid: number;
  platform: string;
  nodeVersion: string;
}

const MB = 1024 * 1024;

@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);
  private readonly startTime = Date.now();
  private shuttingDown = false;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly store: FinanceStore,
    private readonly intentCatalog: IntentCatalogService,
  ) {}

  getHealthStatus(): HealthStatus {
    const uptime = Date.now() - this.startTime;
    const memory = this.getMemoryUsage();
    return {
      status: this.shuttingDown ? 'shutting_down' : memory.heapPercent > 90 ? 'unhealthy' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor(uptime / 1000),
      uptimeFormatted: this.formatUptime(uptime),
      environment: this.config.nodeEnv,
      memory,
    };
  }

  /** Checks the store and the intent catalog as well as memory. */
  async getDetailedHealth(): Promise<DetailedHealth> {
    const basic = this.getHealthStatus();
    const services = {
      storage: await this.checkStorage(),
      intents: this.intentCatalog.isLoaded(),
      memory: basic.status === 'healthy',
    };
    const healthy = Object.values(services).every(Boolean);
    if (!healthy) this.logger.warn(`Health degraded: ${JSON.stringify(services)}`);
    return { ...basic, services, overallHealth: healthy ? 'healthy' : 'degraded' };
  }

  keepAlive(): KeepAlive {
    this.logger.debug('Keep-alive ping received');
    return {
      alive: true,
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      pid: process.pid,
      platform: process.platform,
      nodeVersion: process.version,
    };
  }

  prepareShutdown(): void {
    this.shuttingDown = true;
    this.logger.warn('Health check service preparing for shutdown');
  }

  private async checkStorage(): Promise<boolean> {
    try {
      return await this.store.ping();
    } catch (error) {
      this.logger.error('Storage health check failed', error instanceof Error ? error.stack : String(error));
      return false;
    }
  }

  private getMemoryUsage(): MemoryUsage {
    const usage = process.memoryUsage();
    return {
      rss: Math.round(usage.rss / MB),
      heapUsed: Math.round(usage.heapUsed / MB),
      heapTotal: Math.round(usage.heapTotal / MB),
      heapPercent: usage.heapTotal > 0 ? Math.round((usage.heapUsed / usage.heapTotal) * 100) : 0,
    };
  }

  private formatUptime(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const days = Math.floor(seconds / 86400);
    const hours = Math.floor((seconds % 86400) / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    if (days > 0) return `${days}d ${hours}h ${minutes}m`;
    if (hours > 0) return `${hours}h ${minutes}m`;
    return `${minutes}m ${seconds % 60}s`;
  }
}
