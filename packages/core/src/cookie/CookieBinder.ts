import type { Logger } from "../errors";
import {
    isValidCookieName,
    parseCookieHeader,
    serializeSetCookie,
    type CookieRecord,
    type CookieTemplate,
} from "./CookieCodec";

/**
 * Inbound cookies of a request. `null` means the request carries no such cookie.
 */
export interface CookieSource {
    cookie(name: string): CookieRecord | null;
}

/**
 * Writes a cookie onto a response target.
 */
export type CookieSink<TTarget> = (target: TTarget, cookie: CookieRecord) => void;

/**
 * Anything with Node's `getHeader`/`setHeader` pair, e.g. `http.ServerResponse`.
 */
export type HeaderTarget = {
    getHeader(name: string): unknown;
    setHeader(name: string, value: string | string[]): unknown;
};

/**
 * Copies `template` and overwrites its name and value with the session's key and uid.
 * `template` itself is left untouched, so one template can serve every response.
 */
export function bindCookie(session: { key(): string; uid(): string }, template?: CookieTemplate): CookieRecord {
    return {
        ...(template ?? {}),
        name: session.key(),
        value: session.uid(),
    };
}

/**
 * Reads the uid carried by cookie `name`. Any failure of the source reads as "no cookie".
 */
export function extractUid(
    source: CookieSource | null | undefined,
    name: string,
    logger?: Logger
): string | null {
    if (!source) return null;

    let cookie: CookieRecord | null;
    try {
        cookie = source.cookie(name);
    } catch (e) {
        logger?.debug("Cookie extraction failed.", { name, error: e });
        return null;
    }

    return cookie ? cookie.value : null;
}

/**
 * {@link CookieSource} over a raw Cookie request header.
 */
export function headerCookieSource(header: string | string[] | null | undefined): CookieSource {
    const parsed = parseCookieHeader(Array.isArray(header) ? header.join("; ") : header);

    return {
        cookie(name) {
            const value = parsed[name];
            return value === undefined ? null : { name, value };
        },
    };
}

/**
 * Appends one Set-Cookie value without dropping those already on the response.
 */
export function appendSetCookieHeader(target: HeaderTarget, value: string): void {
    const prev = target.getHeader("Set-Cookie");

    if (prev === undefined || prev === null || prev === "") {
        target.setHeader("Set-Cookie", value);
        return;
    }

    const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
    list.push(value);
    target.setHeader("Set-Cookie", list);
}

/**
 * `false`, with a warning, when `cookie` has a name no Set-Cookie header can carry,
 * such as the empty key of a session whose key was never set. Sinks drop such cookies.
 */
export function acceptCookieName(cookie: CookieRecord, logger?: Logger): boolean {
    if (isValidCookieName(cookie.name)) {
        return true;
    }

    logger?.warn("Skipping cookie with an invalid name.", { name: cookie.name });
    return false;
}

export function createHeaderCookieSink(logger?: Logger): CookieSink<HeaderTarget> {
    return (target, cookie) => {
        if (acceptCookieName(cookie, logger)) {
            appendSetCookieHeader(target, serializeSetCookie(cookie));
        }
    };
}

export const headerCookieSink: CookieSink<HeaderTarget> = createHeaderCookieSink();
