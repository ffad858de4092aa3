import { SidstoreError } from "../errors";

/**
 * Cookie as read from a request or written to a response.
 */
export type CookieRecord = {
    name: string;
    value: string;
    path?: string;
    domain?: string;
    expires?: Date;
    maxAgeSeconds?: number;
    httpOnly?: boolean;
    secure?: boolean;
    sameSite?: "lax" | "strict" | "none";
};

/**
 * Pre-filled cookie attributes. Binding a session overwrites `name` and `value` only.
 */
export type CookieTemplate = Partial<CookieRecord>;

/**
 * `true` for a non-empty RFC 6265 token, the only names a Set-Cookie header can carry.
 */
export function isValidCookieName(name: string): boolean {
    return /^[A-Za-z0-9!#$%&'*+\-.^_`|~]+$/.test(name);
}

/**
 * Parses a raw Cookie header into a key/value map.
 */
export function parseCookieHeader(cookieHeader: string | null | undefined): Record<string, string> {
    const out: Record<string, string> = {};
    if (!cookieHeader) return out;

    for (const p of cookieHeader.split(";")) {
        const idx = p.indexOf("=");
        if (idx < 0) continue;
        const rawKey = p.slice(0, idx).trim();
        const rawVal = p.slice(idx + 1).trim();
        if (!rawKey || Object.hasOwn(out, rawKey)) continue;
        try {
            out[rawKey] = decodeURIComponent(rawVal);
        } catch {
            out[rawKey] = rawVal;
        }
    }
    return out;
}

/**
 * Serializes a Set-Cookie header value. Only the attributes present on `cookie` are written.
 */
export function serializeSetCookie(cookie: CookieRecord): string {
    const { name } = cookie;
    if (!isValidCookieName(name)) {
        throw new SidstoreError("INVALID_COOKIE", `Invalid cookie name: "${name}"`, undefined, { name });
    }

    const segments: string[] = [`${name}=${encodeURIComponent(cookie.value)}`];

    if (cookie.path) segments.push(`Path=${cookie.path}`);
    if (cookie.domain) segments.push(`Domain=${cookie.domain}`);
    if (cookie.expires) segments.push(`Expires=${cookie.expires.toUTCString()}`);
    if (typeof cookie.maxAgeSeconds === "number") {
        segments.push(`Max-Age=${Math.max(0, Math.floor(cookie.maxAgeSeconds))}`);
    }
    if (cookie.httpOnly) segments.push("HttpOnly");
    if (cookie.secure) segments.push("Secure");
    if (cookie.sameSite) {
        segments.push(`SameSite=${cookie.sameSite.charAt(0).toUpperCase()}${cookie.sameSite.slice(1)}`);
    }

    return segments.join("; ");
}
