import { NextFunction } from 'express';
import { isPromiseLike } from '@metrics/domain';
import { MetricsUseCase } from '@metrics/in-ports';
import { ExecutionIdentityPort } from '@metrics/out-ports';
import {
  InboundRequest,
  METRICS_CONTEXT_KEY,
  RequestFieldsExtractor,
} from '../extractors/request-fields.extractor';

export type MetricsHandler<Req, Res> = (
  req: Req,
  res: Res,
  next: NextFunction,
) => unknown;

/**
 * Wrap a plain Express handler so each call runs in its own metrics context.
 *
 * The context is seeded like the interceptor's and closes when the handler
 * returns or its promise settles. Failures are passed to `next`.
 *
 * @example
 * ```typescript
 * router.get('/legacy', withMetricsContext(metrics, identity, (req, res) => {
 *   res.json({ ok: true });
 * }));
 * ```
 */
export function withMetricsContext<Req extends InboundRequest, Res>(
  metrics: MetricsUseCase,
  identity: ExecutionIdentityPort,
  handler: MetricsHandler<Req, Res>,
): (req: Req, res: Res, next: NextFunction) => void {
  return (req, res, next) => {
    let result: unknown;
    try {
      result = metrics.runInContext(
        RequestFieldsExtractor.extract(req, identity.current()),
        (fields) => {
          req[METRICS_CONTEXT_KEY] = fields;
          return handler(req, res, next);
        },
      );
    } catch (error) {
      next(error);
      return;
    }

    if (isPromiseLike(result)) {
      Promise.resolve(result).catch(next);
    }
  };
}
