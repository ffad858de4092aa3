import type { CookieSessionsOptions, RequireSessionOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { CookieSink } from "./cookie/CookieBinder";
import type { CookieTemplate } from "./cookie/CookieCodec";
import { extractUid } from "./cookie/CookieBinder";
import { SidstoreError } from "./errors";
import type { ISession } from "./session/ISession";
import type { SessionStore } from "./store/SessionStore";

const DEFAULT_COOKIE_TEMPLATE: CookieTemplate = {
    path: "/",
    httpOnly: true,
    sameSite: "lax",
};

const contextCookieSink: CookieSink<HttpContext> = (ctx, cookie) => {
    ctx.setCookie(cookie);
};

/**
 * Binds a {@link SessionStore} to requests through its cookie.
 */
export class CookieSessions<TValue> {
    private readonly cookieTemplate: CookieTemplate;

    constructor(
        private readonly store: SessionStore<TValue>,
        private readonly opts: CookieSessionsOptions<TValue> = {}
    ) {
        this.cookieTemplate = opts.cookie ?? DEFAULT_COOKIE_TEMPLATE;
    }

    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            ctx.setSession(this.resolve(ctx));
            await next();
        };
    }

    requireSession(options?: RequireSessionOptions): HttpMiddleware {
        return async (ctx, next) => {
            if (!this.getSession(ctx)) {
                if (options?.onFail) {
                    await options.onFail(ctx);
                    return;
                }
                throw new SidstoreError("SESSION_REQUIRED", "Session required.");
            }
            await next();
        };
    }

    /**
     * Session attached to `ctx` by {@link middleware}, provided it is still live in the store.
     */
    getSession(ctx: HttpContext): ISession<TValue> | null {
        const attached = ctx.getSession();
        return this.store.contains(attached) ? attached : null;
    }

    /**
     * Removes the request's session and tells the client to drop its cookie.
     */
    destroy(ctx: HttpContext): void {
        const name = this.store.requirements.defaultKey;
        const session = this.getSession(ctx);
        const uid = session ? this.store.storedUid(session) : extractUid(ctx, name, this.opts.logger);

        if (uid !== null) {
            this.store.remove(uid);
        }

        contextCookieSink(ctx, { ...this.cookieTemplate, name, value: "", maxAgeSeconds: 0 });
        ctx.setSession(null);
    }

    private resolve(ctx: HttpContext): ISession<TValue> | null {
        const found = this.store.getFromCookie(ctx);
        if (found || !this.opts.createIfMissing) {
            return found;
        }

        const session = this.store.create(this.opts.createIfMissing());
        session.setKey(this.store.requirements.defaultKey);
        session.setHttpCookie(ctx, contextCookieSink, this.cookieTemplate);
        return session;
    }
}
