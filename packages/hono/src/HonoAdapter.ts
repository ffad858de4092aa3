import {
  acceptCookieName,
  defaultErrorBody,
  isSidstoreError,
  SidstoreError,
  statusFromErrorCode,
  type CookieRecord,
  type CookieSink,
  type HttpContext,
  type HttpMiddleware,
  type Logger,
} from "@sidstore/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

/**
 * Context key holding the request's session on Hono context.
 */
export const SIDSTORE_HONO_SESSION_KEY = "session";

/**
 * Adapter options for Hono integration.
 */
export type SidstoreHonoAdapterOptions = {
  onError?: (error: SidstoreError, c: Context) => Promise<Response | void> | Response | void;
};

type HonoHttpContext = HttpContext & {
  _getDirectResponse: () => Response | null;
};

/**
 * Appends a Set-Cookie header to the Hono response. Cookies without a valid name are
 * dropped and reported through `logger`.
 */
export function createHonoCookieSink(logger?: Logger): CookieSink<Context> {
  return (c, cookie) => {
    if (acceptCookieName(cookie, logger)) {
      c.header("Set-Cookie", serializeCookie(cookie.name, cookie.value, toSerializeOptions(cookie)), {
        append: true,
      });
    }
  };
}

export const honoCookieSink: CookieSink<Context> = createHonoCookieSink();

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return buildHonoHttpContext(c);
}

function buildHonoHttpContext(c: Context): HonoHttpContext {
  let statusCode = 200;
  let directResponse: Response | null = null;

  const ctx: HonoHttpContext = {
    cookie(name: string): CookieRecord | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const value = parseCookie(raw)[name];
      return value === undefined ? null : { name, value };
    },

    setCookie(cookie: CookieRecord): void {
      honoCookieSink(c, cookie);
    },

    setSession(session: unknown): void {
      (c.set as (key: string, value: unknown) => void)(SIDSTORE_HONO_SESSION_KEY, session);
    },

    getSession(): unknown {
      return (c.get as (key: string) => unknown)(SIDSTORE_HONO_SESSION_KEY) ?? null;
    },

    status(code: number): void {
      statusCode = code;
      (c.status as (value: number) => void)(code);
    },

    json(body: unknown): void {
      directResponse = (c.json as (value: unknown, status?: number) => Response)(body, statusCode);
    },

    _getDirectResponse(): Response | null {
      return directResponse;
    },
  };

  return ctx;
}

/**
 * Converts core middleware into a Hono middleware handler.
 */
export function toHonoMiddleware(middleware: HttpMiddleware, options?: SidstoreHonoAdapterOptions): MiddlewareHandler {
  return async (c, next) => {
    const ctx = buildHonoHttpContext(c);

    let nextCalled = false;
    try {
      await middleware(ctx, async () => {
        nextCalled = true;
        await next();
      });
    } catch (error) {
      if (isSidstoreError(error)) {
        if (options?.onError) {
          const handled = await options.onError(error, c);
          if (handled) {
            return handled;
          }
          if (c.finalized) {
            return;
          }
        }
        return (c.json as (value: unknown, status?: number) => Response)(
          defaultErrorBody(error.code, error.message),
          statusFromErrorCode(error.code),
        );
      }
      throw error;
    }

    if (c.finalized) {
      return;
    }

    if (!nextCalled) {
      const response = ctx._getDirectResponse();
      if (response) {
        return response;
      }
      return (c.body as (data: null, status?: number) => Response)(null, c.res.status || 200);
    }
  };
}

function toSerializeOptions(cookie: CookieRecord): SerializeOptions {
  const options: SerializeOptions = {};
  if (cookie.path !== undefined) options.path = cookie.path;
  if (cookie.domain !== undefined) options.domain = cookie.domain;
  if (cookie.expires !== undefined) options.expires = cookie.expires;
  if (cookie.maxAgeSeconds !== undefined) options.maxAge = Math.max(0, Math.floor(cookie.maxAgeSeconds));
  if (cookie.httpOnly !== undefined) options.httpOnly = cookie.httpOnly;
  if (cookie.secure !== undefined) options.secure = cookie.secure;
  if (cookie.sameSite !== undefined) options.sameSite = cookie.sameSite;
  return options;
}
