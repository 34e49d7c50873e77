import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { AppError, RateLimitError, generateUlid } from '@shepherd/shared';
import { authenticate, getClientIp } from './middleware';
import { requestContext } from './context';
import type { RequestContext } from './context';
import { requirePermission } from '../permissions/middleware';
import { enforceRateLimit, rateLimitHeaders } from '../security/rate-limiter';
import type { RateLimitConfig, RateLimitResult } from '../security/rate-limiter';
import { getConfig } from '../config';
import { logger, serializeError } from '../observability/logger';

type RouteParams = Record<string, string>;

/** Second argument Next.js passes to App Router handlers. */
interface RouteSegment {
  params: Promise<RouteParams>;
}

export type HandlerContext = RequestContext & { params: RouteParams };

export type RouteHandler = (
  request: NextRequest,
  context: HandlerContext,
) => Promise<NextResponse>;

export interface PublicContext {
  requestId: string;
  ipAddress: string;
  params: RouteParams;
}

export type PublicRouteHandler = (
  request: NextRequest,
  context: PublicContext,
) => Promise<NextResponse>;

export interface MiddlewareOptions {
  permission?: string;
  /** Per-address limit; the key is `<prefix>:<ip>`. */
  rateLimit?: RateLimitConfig & { prefix: string };
}

export function errorResponse(error: unknown, requestId: string): NextResponse {
  if (error instanceof RateLimitError) {
    return NextResponse.json(
      { error: { code: error.code, message: error.message, retryAfter: error.retryAfter } },
      { status: error.statusCode, headers: { 'Retry-After': String(error.retryAfter) } },
    );
  }
  if (error instanceof AppError) {
    return NextResponse.json(
      { error: { code: error.code, message: error.message, details: error.details } },
      { status: error.statusCode },
    );
  }

  logger.error('Unhandled error in route handler', { requestId, error: serializeError(error) });
  const rawMsg = error instanceof Error ? error.message : String(error);
  return NextResponse.json(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: getConfig().NODE_ENV === 'development' ? rawMsg : 'An unexpected error occurred',
      },
    },
    { status: 500 },
  );
}

function limitRequest(ipAddress: string, options?: Pick<MiddlewareOptions, 'rateLimit'>) {
  if (!options?.rateLimit) return undefined;
  const { prefix, ...config } = options.rateLimit;
  return enforceRateLimit(`${prefix}:${ipAddress}`, config);
}

function withLimitHeaders(response: NextResponse, limit: RateLimitResult | undefined): NextResponse {
  if (limit) {
    for (const [name, value] of Object.entries(rateLimitHeaders(limit))) {
      response.headers.set(name, value);
    }
  }
  return response;
}

async function run(
  request: NextRequest,
  requestId: string,
  execute: () => Promise<NextResponse>,
  userId: () => string | undefined,
): Promise<NextResponse> {
  const startTime = Date.now();
  let response: NextResponse;
  try {
    response = await execute();
  } catch (error) {
    response = errorResponse(error, requestId);
  }

  logger.info('request', {
    requestId,
    userId: userId(),
    method: request.method,
    path: new URL(request.url).pathname,
    statusCode: response.status,
    durationMs: Date.now() - startTime,
  });
  return response;
}

/**
 * Authenticated route: Bearer token, optional permission and rate limit,
 * handler runs inside the request's AsyncLocalStorage context.
 */
export function withMiddleware(handler: RouteHandler, options?: MiddlewareOptions) {
  return async (request: NextRequest, segment?: RouteSegment): Promise<NextResponse> => {
    const requestId = generateUlid();
    let ctx: HandlerContext | undefined;

    return run(
      request,
      requestId,
      async () => {
        const ipAddress = getClientIp(request);
        const limit = limitRequest(ipAddress, options);

        const user = await authenticate(request);
        const handlerCtx: HandlerContext = {
          user,
          requestId,
          ipAddress,
          branchId: request.headers.get('x-branch-id') || undefined,
          params: segment ? await segment.params : {},
        };
        ctx = handlerCtx;

        if (options?.permission) {
          await requirePermission(options.permission)(handlerCtx);
        }

        const response = await requestContext.run(handlerCtx, () => handler(request, handlerCtx));
        return withLimitHeaders(response, limit);
      },
      () => ctx?.user.id,
    );
  };
}

/** Unauthenticated route (login, token refresh). */
export function withPublicMiddleware(
  handler: PublicRouteHandler,
  options?: Pick<MiddlewareOptions, 'rateLimit'>,
) {
  return async (request: NextRequest, segment?: RouteSegment): Promise<NextResponse> => {
    const requestId = generateUlid();

    return run(
      request,
      requestId,
      async () => {
        const ipAddress = getClientIp(request);
        const limit = limitRequest(ipAddress, options);
        const params = segment ? await segment.params : {};
        return withLimitHeaders(await handler(request, { requestId, ipAddress, params }), limit);
      },
      () => undefined,
    );
  };
}
