import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MetricsSinkPort } from '@metrics/out-ports';
import { Severity } from '@metrics/value-objects';

/**
 * NestLoggerSink - writes records and diagnostics through the Nest logger.
 */
@Injectable()
export class NestLoggerSink extends MetricsSinkPort {
  private readonly logger: Logger;

  constructor(private readonly configService: ConfigService) {
    super();
    this.logger = new Logger(
      this.configService.get<string>('metrics.loggerName', 'metrics'),
    );
  }

  emit(severity: Severity, message: string): void {
    switch (severity) {
      case Severity.DEBUG:
        this.logger.debug(message);
        return;
      case Severity.INFO:
        this.logger.log(message);
        return;
      case Severity.WARNING:
        this.logger.warn(message);
        return;
    }
  }
}
