import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { FieldMap } from '@metrics/domain';
import { InboundRequest } from '../extractors/request-fields.extractor';

export function metricsFieldsFactory(
  _data: unknown,
  context: ExecutionContext,
): FieldMap | undefined {
  return context.switchToHttp().getRequest<InboundRequest>().metricsContext;
}

/**
 * @MetricsFields - Injects the live field map of the request's context.
 * Undefined when the route is excluded with @NoMetrics().
 *
 * @example
 * ```typescript
 * @Get(':sku')
 * getStock(@Param('sku') sku: string, @MetricsFields() fields?: FieldMap) {
 *   if (fields) fields.sku = sku;
 * }
 * ```
 */
export const MetricsFields = createParamDecorator(metricsFieldsFactory);
