import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Observable, Subscription } from 'rxjs';
import { ScopeExit, Timer, describeError } from '@metrics/domain';
import { MetricsUseCase } from '@metrics/in-ports';
import { ExecutionIdentityPort } from '@metrics/out-ports';
import { NO_METRICS_KEY, TIMED_EVENT_KEY } from './decorators';
import {
  InboundRequest,
  METRICS_CONTEXT_KEY,
  RequestFieldsExtractor,
} from './extractors/request-fields.extractor';

/**
 * MetricsContextInterceptor - one metrics context per HTTP request.
 *
 * Responsibilities:
 * - Seed the context with the request fields and expose the live map on the request
 * - Run the handler inside the ambient binding
 * - Time the handler when it carries @TimedEvent()
 * - Close the context exactly once: on completion, error or unsubscribe
 *
 * Values and errors from the handler pass through unchanged.
 */
@Injectable()
export class MetricsContextInterceptor implements NestInterceptor {
  private readonly logger = new Logger(MetricsContextInterceptor.name);

  constructor(
    private readonly metrics: MetricsUseCase,
    private readonly identity: ExecutionIdentityPort,
    private readonly reflector: Reflector,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http' || this.isExcluded(context)) {
      return next.handle();
    }

    const request = context.switchToHttp().getRequest<InboundRequest>();
    const timedEvent = this.reflector.get<string | undefined>(
      TIMED_EVENT_KEY,
      context.getHandler(),
    );

    return new Observable<unknown>((subscriber) => {
      const metricsContext = this.metrics.openContext(
        RequestFieldsExtractor.extract(request, this.identity.current()),
      );
      request[METRICS_CONTEXT_KEY] = metricsContext.fields;

      let timer: Timer | undefined;
      let open = true;
      const finish = (exit: ScopeExit): void => {
        if (!open) {
          return;
        }
        open = false;
        try {
          if (timer?.isRunning) {
            timer.stop();
          }
        } finally {
          this.metrics.closeContext(metricsContext, exit);
        }
      };

      let subscription: Subscription;
      try {
        timer = timedEvent ? metricsContext.timer(timedEvent) : undefined;
        subscription = this.metrics.bindContext(metricsContext, () => {
          timer?.start();
          return next.handle().subscribe({
            next: (value: unknown) => subscriber.next(value),
            error: (error: unknown) => {
              this.finishQuietly(finish, { failed: true, error });
              subscriber.error(error);
            },
            complete: () => {
              try {
                finish({ failed: false });
              } catch (error) {
                subscriber.error(error);
                return;
              }
              subscriber.complete();
            },
          });
        });
      } catch (error) {
        this.finishQuietly(finish, { failed: true, error });
        throw error;
      }

      return () => {
        subscription.unsubscribe();
        this.finishQuietly(finish, {
          failed: true,
          error: new Error('Request was unsubscribed before completion'),
        });
      };
    });
  }

  private isExcluded(context: ExecutionContext): boolean {
    return (
      this.reflector.getAllAndOverride<boolean | undefined>(NO_METRICS_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) === true
    );
  }

  /**
   * Close after the request already failed; the request's own error is the
   * one the caller sees, so a close failure is only logged.
   */
  private finishQuietly(
    finish: (exit: ScopeExit) => void,
    exit: ScopeExit,
  ): void {
    try {
      finish(exit);
    } catch (error) {
      this.logger.error(
        `Failed to close metrics context: ${describeError(error)}`,
      );
    }
  }
}
