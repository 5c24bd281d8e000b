import { Controller, Get } from '@nestjs/common';
import { MetricsStats } from '@metrics/service';
import { NoMetrics } from '@metrics/presentation';
import { AppService } from './app.service';

@Controller()
@NoMetrics()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  getHealth(): { status: string; message: string } {
    return this.appService.getHealth();
  }

  @Get('metrics/stats')
  getMetricsStats(): MetricsStats {
    return this.appService.getMetricsStats();
  }
}
