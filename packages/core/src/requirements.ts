/**
 * Cookie name used when {@link Requirements.defaultKey} is empty.
 */
export const DEFAULT_COOKIE_KEY = "_ssid";

/**
 * Inactivity window used when {@link Requirements.timeoutMs} is unset or zero.
 */
export const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Base setup of a {@link SessionStore}.
 */
export type Requirements = {
    /** Cookie name under which a store looks up session uids. */
    defaultKey?: string;

    /**
     * Inactivity window in milliseconds after which an untouched session may be evicted.
     * `0` selects {@link DEFAULT_TIMEOUT_MS}; it does not disable expiry.
     */
    timeoutMs?: number;

    /**
     * Extra uniqueness source consulted during allocation, e.g. a lookup in durable storage.
     * Absent means "never exists".
     */
    uidExist?: (uid: string) => boolean;
};

export type NormalizedRequirements = Readonly<Required<Requirements>>;

function neverExists(_uid: string): boolean {
    return false;
}

/**
 * Fills every unset field of `r` with its fallback. Never throws.
 */
export function normalizeRequirements(r?: Requirements): NormalizedRequirements {
    const timeoutMs = r?.timeoutMs;

    return Object.freeze({
        defaultKey: r?.defaultKey || DEFAULT_COOKIE_KEY,
        timeoutMs:
            typeof timeoutMs === "number" && Number.isFinite(timeoutMs) && timeoutMs > 0
                ? timeoutMs
                : DEFAULT_TIMEOUT_MS,
        uidExist: r?.uidExist ?? neverExists,
    });
}

/**
 * Reports whether `r` asked for a timeout that normalization replaced with the fallback.
 */
export function isTimeoutCoerced(r?: Requirements): boolean {
    return r?.timeoutMs !== undefined && normalizeRequirements(r).timeoutMs !== r.timeoutMs;
}
