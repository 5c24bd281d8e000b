import { FieldMap } from '@metrics/domain';

/** Request property holding the live field map of the request's context. */
export const METRICS_CONTEXT_KEY = 'metricsContext';

/**
 * The parts of an Express request the adapter reads and writes.
 */
export interface InboundRequest {
  ip?: string;
  originalUrl?: string;
  url?: string;
  socket?: { remoteAddress?: string };
  [METRICS_CONTEXT_KEY]?: FieldMap;
}

/**
 * RequestFieldsExtractor - derives the seed fields of a request context.
 *
 * - REMOTE_ADDR: client address, empty when unknown
 * - PATH_INFO: path without the query string
 * - QUERY_STRING: raw query without the leading '?', empty when none
 * - thread: identity of the execution chain serving the request
 */
export class RequestFieldsExtractor {
  static extract(request: InboundRequest, thread: string): FieldMap {
    const url = request.originalUrl ?? request.url ?? '';
    const queryIndex = url.indexOf('?');

    return {
      REMOTE_ADDR: request.ip ?? request.socket?.remoteAddress ?? '',
      PATH_INFO: queryIndex === -1 ? url : url.slice(0, queryIndex),
      QUERY_STRING: queryIndex === -1 ? '' : url.slice(queryIndex + 1),
      thread,
    };
  }
}
