import { Controller, Get } from '@nestjs/common';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
}

/**
 * Liveness probe
 *
 * GET /health -> { status: 'ok', timestamp: '2024-01-01T00:00:00.000Z' }
 */
@Controller('health')
export class HealthController {
  @Get()
  check(): HealthStatus {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }
}
