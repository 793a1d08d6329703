import { AppConfig } from '../config/app.config';
import { IntentCatalogService } from '../intents/intent-catalog.service';
import { InMemoryFinanceStore } from '../storage/in-memory-finance-store';
import { HealthCheckService } from './health-check.service';

describe('HealthCheckService', () => {
  const config: AppConfig = { port: 3000, nodeEnv: 'test', storageDriver: 'memory', intentsPath: '/nonexistent/intents.json' };
  let store: InMemoryFinanceStore;
  let catalog: IntentCatalogService;
  let service: HealthCheckService;

  beforeEach(() => {
    store = new InMemoryFinanceStore();
    catalog = new IntentCatalogService(config);
    service = new HealthCheckService(config, store, catalog);
  });

  it('reports degraded until the intent catalog is loaded', async () => {
    const report = await service.getDetailedHealth();
    expect(report.services.intents).toBe(false);
    expect(report.overallHealth).toBe('degraded');
  });

  it('marks storage down when the ping fails', async () => {
    jest.spyOn(catalog, 'isLoaded').mockReturnValue(true);
    jest.spyOn(store, 'ping').mockRejectedValue(new Error('connection refused'));

    const report = await service.getDetailedHealth();
    expect(report.services.storage).toBe(false);
    expect(report.overallHealth).toBe('degraded');
  });

  it('reports shutting down once asked to', () => {
    service.prepareShutdown();
    expect(service.getHealthStatus()).toMatchObject({ status: 'shutting_down', environment: 'test' });
  });
});
