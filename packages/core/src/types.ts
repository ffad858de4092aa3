import type { CookieTemplate } from "./cookie/CookieCodec";
import type { HttpContext } from "./http/HttpContext";
import type { Logger } from "./errors";

/**
 * Configuration for {@link CookieSessions}.
 */
export type CookieSessionsOptions<TValue> = {
    /** Attributes of the cookie written for new sessions. Default: `Path=/; HttpOnly; SameSite=Lax`. */
    cookie?: CookieTemplate;

    /** When set, requests without a live session get a new one holding this value. */
    createIfMissing?: () => TValue;

    logger?: Logger;
};

/**
 * Options for {@link CookieSessions.requireSession}.
 */
export type RequireSessionOptions = {
    onFail?: (ctx: HttpContext) => Promise<void> | void;
};
