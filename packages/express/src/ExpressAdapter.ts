import {
  acceptCookieName,
  appendSetCookieHeader,
  defaultErrorBody,
  isSidstoreError,
  statusFromErrorCode,
  SidstoreError,
  type CookieRecord,
  type CookieSink,
  type HttpContext,
  type HttpMiddleware,
  type Logger,
} from "@sidstore/core";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

export type SidstoreExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
  session?: unknown;
};

export type SidstoreExpressResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: string | string[]): unknown;
};

export type SidstoreExpressNext = (error?: unknown) => void;
export type SidstoreExpressHandler = (
  req: SidstoreExpressRequest,
  res: SidstoreExpressResponse,
  next: SidstoreExpressNext,
) => Promise<void>;

export type SidstoreExpressAdapterOptions = {
  onError?: (error: SidstoreError, req: SidstoreExpressRequest, res: SidstoreExpressResponse) => Promise<void> | void;
};

/**
 * Writes a cookie as one more Set-Cookie header on an Express response. Cookies without
 * a valid name are dropped and reported through `logger`.
 */
export function createExpressCookieSink(logger?: Logger): CookieSink<SidstoreExpressResponse> {
  return (res, cookie) => {
    if (acceptCookieName(cookie, logger)) {
      appendSetCookieHeader(res, serializeCookie(cookie.name, cookie.value, toSerializeOptions(cookie)));
    }
  };
}

export const expressCookieSink: CookieSink<SidstoreExpressResponse> = createExpressCookieSink();

export function createExpressHttpContext(req: SidstoreExpressRequest, res: SidstoreExpressResponse): HttpContext {
  return {
    cookie(name: string): CookieRecord | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const value = parseCookie(Array.isArray(header) ? header.join("; ") : header)[name];
      return value === undefined ? null : { name, value };
    },

    setCookie(cookie: CookieRecord): void {
      expressCookieSink(res, cookie);
    },

    setSession(session: unknown): void {
      req.session = session;
    },

    getSession(): unknown {
      return req.session ?? null;
    },

    status(code: number): void {
      res.status(code);
    },

    json(body: unknown): void {
      res.json(body);
    },
  };
}

export function toExpressMiddleware(
  middleware: HttpMiddleware,
  options?: SidstoreExpressAdapterOptions,
): SidstoreExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      await middleware(ctx, async () => {
        next();
      });
    } catch (error) {
      if (isSidstoreError(error)) {
        if (options?.onError) {
          await options.onError(error, req, res);
          return;
        }

        res.status(statusFromErrorCode(error.code));
        res.json(defaultErrorBody(error.code, error.message));
        return;
      }

      next(error);
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
