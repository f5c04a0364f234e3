import { Controller, Get } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';

/**
 * HealthController provides health check endpoints for Docker/K8s
 *
 * Endpoints:
 * - GET /health - Full health check (mutex store)
 * - GET /health/live - Liveness probe (app is running)
 * - GET /health/ready - Readiness probe (store reachable)
 */
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * Full health check - checks all dependencies
   */
  @Get()
  async check(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }

  /**
   * Liveness probe - is the app process alive?
   */
  @Get('live')
  live(): { status: string } {
    return { status: 'ok' };
  }

  /**
   * Readiness probe - can the app take and release locks?
   */
  @Get('ready')
  async ready(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }
}
