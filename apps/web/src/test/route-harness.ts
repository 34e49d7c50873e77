import { NextRequest } from 'next/server';
import type { NextResponse } from 'next/server';
import type {
  HandlerContext,
  MiddlewareOptions,
  PublicContext,
  PublicRouteHandler,
  RouteHandler,
} from '@shepherd/core';
import { createTestContext } from '@shepherd/core/testing';

export const BASE = 'http://localhost/api/v1';

type RouteParams = Record<string, string>;
type ErrorMapper = (error: unknown, requestId: string) => NextResponse;

/** Permission each wrapped handler was registered with, in module load order. */
export const routePermissions: Array<string | undefined> = [];

/**
 * Stand-ins for withMiddleware/withPublicMiddleware: no token or permission
 * check, the test user from createTestContext, errors mapped by the real
 * errorResponse.
 */
export function stubMiddleware(errorResponse: ErrorMapper) {
  const withMiddleware = (handler: RouteHandler, options?: MiddlewareOptions) => {
    routePermissions.push(options?.permission);
    return async (request: NextRequest, segment?: { params: Promise<RouteParams> }) => {
      const ctx: HandlerContext = {
        ...createTestContext(),
        params: segment ? await segment.params : {},
      };
      try {
        return await handler(request, ctx);
      } catch (error) {
        return errorResponse(error, ctx.requestId);
      }
    };
  };

  const withPublicMiddleware = (handler: PublicRouteHandler) => {
    return async (request: NextRequest, segment?: { params: Promise<RouteParams> }) => {
      const ctx: PublicContext = {
        requestId: 'req-1',
        ipAddress: '203.0.113.7',
        params: segment ? await segment.params : {},
      };
      try {
        return await handler(request, ctx);
      } catch (error) {
        return errorResponse(error, ctx.requestId);
      }
    };
  };

  return { withMiddleware, withPublicMiddleware };
}

export function getRequest(path: string): NextRequest {
  return new NextRequest(`${BASE}${path}`);
}

export function jsonRequest(method: string, path: string, body: unknown): NextRequest {
  return new NextRequest(`${BASE}${path}`, {
    method,
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json' },
  });
}

export function params(values: RouteParams): { params: Promise<RouteParams> } {
  return { params: Promise.resolve(values) };
}
