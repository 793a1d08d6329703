import { BadRequestException, Body, Controller, Get, HttpCode, Post, ServiceUnavailableException } from '@nestjs/common';
import { DialogueService } from './dialogue/dialogue.service';
import { DetailedHealth, HealthCheckService, KeepAlive } from './health/health-check.service';

export interface ChatRequest {
  userId: string;
  message: string;
}

export interface ChatReply {
  reply: string;
}

const MAX_MESSAGE_LENGTH = 1000;

function parseChatRequest(body: unknown): ChatRequest {
  if (typeof body !== 'object' || body === null || !('userId' in body) || !('message' in body)) {
    throw new BadRequestException('Body must be { "userId": string, "message": string }');
  }
  const { userId, message } = body;
  if (typeof userId !== 'string' || !userId.trim()) {
    throw new BadRequestException('userId must be a non-empty string');
  }
  if (typeof message !== 'string') {
    throw new BadRequestException('message must be a string');
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    throw new BadRequestException(`message must be at most ${MAX_MESSAGE_LENGTH} characters`);
  }
  return { userId: userId.trim(), message };
}

@Controller()
export class AppController {
  constructor(
    private readonly dialogueService: DialogueService,
    private readonly healthCheckService: HealthCheckService,
  ) {}

  @Post('chat')
  @HttpCode(200)
  async chat(@Body() body: unknown): Promise<ChatReply> {
    const { userId, message } = parseChatRequest(body);
    return { reply: await this.dialogueService.processTurn(message, userId) };
  }

  @Get('health')
  async health(): Promise<DetailedHealth> {
    const health = await this.healthCheckService.getDetailedHealth();
    if (health.overallHealth !== 'healthy') {
      throw new ServiceUnavailableException(health);
    }
    return health;
  }

  @Get('alive')
  alive(): KeepAlive {
    return this.healthCheckService.keepAlive();
  }
}
