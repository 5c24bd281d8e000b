import { Injectable } from '@nestjs/common';
import { MetricsService, MetricsStats } from '@metrics/service';

@Injectable()
export class AppService {
  constructor(private readonly metricsService: MetricsService) {}

  getHealth(): { status: string; message: string } {
    return {
      status: 'ok',
      message: 'Health check passed',
    };
  }

  getMetricsStats(): MetricsStats {
    return this.metricsService.getStats();
  }
}
