import type { CookieSource } from "../cookie/CookieBinder";
import type { CookieRecord } from "../cookie/CookieCodec";

/**
 * Framework-neutral HTTP context required by {@link CookieSessions}.
 */
export interface HttpContext extends CookieSource {
    // Cookie I/O
    cookie(name: string): CookieRecord | null;
    setCookie(cookie: CookieRecord): void;

    // Per-request session slot
    setSession(session: unknown): void;
    getSession(): unknown;

    // Response helpers
    status(code: number): void;
    json(body: unknown): void;
}

export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
