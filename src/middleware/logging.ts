/**
 * Request logging middleware.
 * One event per request with method, path, status, duration and user id,
 * plus the route template and the journey, meeting or user the path names,
 * so requests for one journey can be followed across stages.
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn (with the error code from the body)
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

const API_PREFIX = '/api/v1/';

/** Path segments followed by an id, and the field each id is logged under. */
const ID_SEGMENTS = new Map([
  ['journeys', 'journeyId'],
  ['meetings', 'meetingId'],
  ['compatibility', 'targetUserId'],
]);

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/**
 * `/api/v1/journeys/j-1/meetings/m-2/respond` →
 * route `/api/v1/journeys/:journeyId/meetings/:meetingId/respond` with both ids.
 */
export function describeRoute(path: string): { route: string; ids: Record<string, string> } {
  if (!path.startsWith(API_PREFIX)) return { route: path, ids: {} };

  const segments = path.slice(API_PREFIX.length).split('/').filter(Boolean);
  const ids: Record<string, string> = {};
  const template: string[] = [];

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    template.push(segment);

    const field = ID_SEGMENTS.get(segment);
    const next = segments[i + 1];
    if (field && next !== undefined) {
      ids[field] = next;
      template.push(`:${field}`);
      i++;
    }
  }
  return { route: API_PREFIX + template.join('/'), ids };
}

async function errorCodeOf(response: Response): Promise<string | undefined> {
  if (!response.headers.get('Content-Type')?.includes('application/json')) return undefined;

  const body: unknown = await response
    .clone()
    .json()
    .catch(() => undefined);
  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;

  const { error } = body;
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const url = new URL(req.url);
      const method = req.method;
      const path = url.pathname;
      const { route, ids } = describeRoute(path);
      const start = performance.now();

      try {
        const response = await next(req, ctx);
        const durationMs = Math.round(performance.now() - start);
        const status = response.status;
        const errorCode = status >= 400 ? await errorCodeOf(response) : undefined;

        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          fields: { route, ...ids, ...(errorCode ? { errorCode } : {}) },
          ...(ctx.userId ? { userId: ctx.userId } : {}),
        };

        logProvider.log(event);
        return response;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: RequestLogEvent = {
          level: 'error',
          message: `${method} ${path} → 500 (${durationMs}ms)`,
          method,
          path,
          status: 500,
          durationMs,
          fields: {
            route,
            ...ids,
            error: err instanceof Error ? err.message : String(err),
          },
          ...(ctx.userId ? { userId: ctx.userId } : {}),
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
