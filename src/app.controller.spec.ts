import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppController } from './app.controller';
import { DialogueService } from './dialogue/dialogue.service';
import { DetailedHealth, HealthCheckService } from './health/health-check.service';

function health(overallHealth: DetailedHealth['overallHealth']): DetailedHealth {
  return {
    status: 'healthy',
    timestamp: '2025-01-01T00:00:00.000Z',
    uptime: 10,
    uptimeFormatted: '0m 10s',
    environment: 'test',
    memory: { rss: 80, heapUsed: 40, heapTotal: 60, heapPercent: 67 },
    services: { storage: overallHealth === 'healthy', intents: true, memory: true },
    overallHealth,
  };
}

describe('AppController', () => {
  let controller: AppController;
  const processTurn = jest.fn<Promise<string>, [string, string]>();
  const getDetailedHealth = jest.fn<Promise<DetailedHealth>, []>();

  beforeEach(async () => {
    processTurn.mockReset().mockResolvedValue('Hello!');
    getDetailedHealth.mockReset();

    const moduleRef = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        { provide: DialogueService, useValue: { processTurn } },
        { provide: HealthCheckService, useValue: { getDetailedHealth, keepAlive: jest.fn() } },
      ],
    }).compile();

    controller = moduleRef.get(AppController);
  });

  describe('chat', () => {
    it('passes the message to the dialogue', async () => {
      await expect(controller.chat({ userId: ' u1 ', message: 'hi' })).resolves.toEqual({ reply: 'Hello!' });
      expect(processTurn).toHaveBeenCalledWith('hi', 'u1');
    });

    it('rejects malformed bodies', async () => {
      await expect(controller.chat({ message: 'hi' })).rejects.toBeInstanceOf(BadRequestException);
      await expect(controller.chat({ userId: '  ', message: 'hi' })).rejects.toBeInstanceOf(BadRequestException);
      await expect(controller.chat({ userId: 'u1', message: 42 })).rejects.toBeInstanceOf(BadRequestException);
      await expect(controller.chat({ userId: 'u1', message: 'x'.repeat(1001) })).rejects.toBeInstanceOf(BadRequestException);
      expect(processTurn).not.toHaveBeenCalled();
    });
  });

  describe('health', () => {
    it('returns the report when healthy', async () => {
      getDetailedHealth.mockResolvedValue(health('healthy'));
      await expect(controller.health()).resolves.toMatchObject({ overallHealth: 'healthy' });
    });

    it('answers 503 when degraded', async () => {
      getDetailedHealth.mockResolvedValue(health('degraded'));
      await expect(controller.health()).rejects.toBeInstanceOf(ServiceUnavailableException);
    });
  });
});
