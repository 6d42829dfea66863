import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { HealthService, SERVICE_NAME } from './health.service';
import { Public } from '../common/decorators/public.decorator';

@Public()
@SkipThrottle()
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /** 503 lets load balancers drop the instance. */
  @Get()
  async check() {
    const report = await this.healthService.check();
    if (report.status !== 'healthy') {
      throw new HttpException(report, HttpStatus.SERVICE_UNAVAILABLE);
    }
    return report;
  }

  @Get('live')
  live() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
    };
  }

  // Always 200; the process can recover once the database is back.
  @Get('ready')
  ready() {
    return this.healthService.readiness();
  }
}
