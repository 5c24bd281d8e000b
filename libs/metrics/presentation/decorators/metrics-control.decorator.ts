import { SetMetadata } from '@nestjs/common';

/**
 * Metadata keys for metrics control decorators
 */
export const NO_METRICS_KEY = 'no_metrics';
export const TIMED_EVENT_KEY = 'timed_event';

/**
 * @NoMetrics - No context is opened for the endpoint.
 *
 * @example
 * ```typescript
 * @Get('health')
 * @NoMetrics()
 * healthCheck() {
 *   return { status: 'ok' };
 * }
 * ```
 */
export const NoMetrics = () => SetMetadata(NO_METRICS_KEY, true);

/**
 * @TimedEvent - Records the handler's execution as a timed event on the
 * request context.
 *
 * @example
 * ```typescript
 * @Get(':sku')
 * @TimedEvent('inventory_request')
 * getStock(@Param('sku') sku: string) { ... }
 * ```
 */
export const TimedEvent = (name: string) => SetMetadata(TIMED_EVENT_KEY, name);
