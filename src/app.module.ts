import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from '@config';
import { MetricsModule } from '@metrics';
import { MetricsContextInterceptor } from '@metrics/presentation';
import { InventoryModule } from '@inventory';
import { AppController } from './app.controller';
import { AppService } from './app.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    MetricsModule.forRoot(),
    InventoryModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsContextInterceptor,
    },
  ],
})
export class AppModule {}
