import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService, registerAs } from '@nestjs/config';
import { MetricsConfig, metricsConfig } from '@config';
import { MetricsUseCase } from '@metrics/in-ports';
import {
  ClockPort,
  ExecutionIdentityPort,
  MetricsSinkPort,
} from '@metrics/out-ports';
import { ContextService, MetricsService } from '@metrics/service';
import {
  FileSink,
  NestLoggerSink,
  NodeExecutionIdentity,
  SystemClock,
} from '@metrics/infrastructure';
import { MetricsContextInterceptor } from '@metrics/presentation';

export interface MetricsModuleOptions {
  /** Overrides for values otherwise read from the environment. */
  config?: Partial<MetricsConfig>;
  sink?: MetricsSinkPort;
  clock?: ClockPort;
  identity?: ExecutionIdentityPort;
}

function createDefaultSink(configService: ConfigService): MetricsSinkPort {
  const logSink = new NestLoggerSink(configService);
  const logFile = configService.get<string>('metrics.logFile');
  return logFile ? new FileSink(logFile, logSink) : logSink;
}

/**
 * MetricsModule - NestJS module for the metrics library.
 *
 * Marked @Global() so that forRoot() in AppModule makes MetricsUseCase and
 * the interceptor available everywhere.
 */
@Global()
@Module({})
export class MetricsModule {
  static forRoot(options: MetricsModuleOptions = {}): DynamicModule {
    const overrides = options.config;
    const config = overrides
      ? registerAs('metrics', () => ({ ...metricsConfig(), ...overrides }))
      : metricsConfig;

    const ports: Provider[] = [
      options.sink
        ? { provide: MetricsSinkPort, useValue: options.sink }
        : {
            provide: MetricsSinkPort,
            useFactory: createDefaultSink,
            inject: [ConfigService],
          },
      options.clock
        ? { provide: ClockPort, useValue: options.clock }
        : { provide: ClockPort, useClass: SystemClock },
      options.identity
        ? { provide: ExecutionIdentityPort, useValue: options.identity }
        : { provide: ExecutionIdentityPort, useClass: NodeExecutionIdentity },
    ];

    return {
      module: MetricsModule,
      imports: [ConfigModule.forFeature(config)],
      providers: [
        ...ports,
        ContextService,
        MetricsService,
        { provide: MetricsUseCase, useExisting: MetricsService },
        MetricsContextInterceptor,
      ],
      exports: [
        MetricsUseCase,
        MetricsService,
        ContextService,
        ExecutionIdentityPort,
        MetricsContextInterceptor,
      ],
    };
  }
}
