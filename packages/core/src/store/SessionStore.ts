import type { Cache } from "../cache/Cache";
import { MemoryCache } from "../cache/MemoryCache";
import { extractUid, type CookieSource } from "../cookie/CookieBinder";
import type { Logger } from "../errors";
import {
    isTimeoutCoerced,
    normalizeRequirements,
    type NormalizedRequirements,
    type Requirements,
} from "../requirements";
import type { ISession, ModifiedTracker } from "../session/ISession";
import { Session } from "../session/Session";
import { allocateUid, UidReservations } from "../uid/UidAllocator";
import { DEFAULT_UID_LENGTH, randomId, type RandomSource } from "../uid/randomId";

/**
 * Collaborators of a {@link SessionStore}. Everything defaults to an in-process implementation.
 */
export type SessionStoreOptions<TValue> = {
    sessions?: Cache<string, ISession<TValue>>;
    modified?: Cache<string, ISession<TValue>>;
    random?: RandomSource;
    uidLength?: number; // default 99
    logger?: Logger;
};

/**
 * Owns the live sessions of one server, plus the index of sessions changed since the
 * caller last drained it.
 *
 * The modified index is never cleared by the store itself except through {@link remove};
 * whoever persists it calls {@link clearModified}. A session evicted by its timeout may
 * linger there until then.
 */
export class SessionStore<TValue> {
    readonly requirements: NormalizedRequirements;

    private readonly sessions: Cache<string, ISession<TValue>>;
    private readonly modified: Cache<string, ISession<TValue>>;
    private readonly reservations = new UidReservations();
    private readonly storedUids = new WeakMap<object, string>(); // uid each session was stored under
    private readonly random: RandomSource;
    private readonly uidLength: number;
    private readonly logger: Logger | undefined;
    private readonly tracker: ModifiedTracker<TValue> = {
        markModified: (session) => this.onModified(session),
    };

    constructor(requirements?: Requirements, options?: SessionStoreOptions<TValue>) {
        this.requirements = normalizeRequirements(requirements);
        this.sessions = options?.sessions ?? new MemoryCache<string, ISession<TValue>>();
        this.modified = options?.modified ?? new MemoryCache<string, ISession<TValue>>();
        this.random = options?.random ?? randomId;
        this.uidLength = options?.uidLength ?? DEFAULT_UID_LENGTH;
        this.logger = options?.logger;

        if (isTimeoutCoerced(requirements)) {
            this.logger?.warn("Requested session timeout replaced by the default inactivity window.", {
                requestedMs: requirements?.timeoutMs,
                timeoutMs: this.requirements.timeoutMs,
            });
        }
    }

    /**
     * Creates a session holding `value` under a freshly allocated uid.
     *
     * Does not return if the uid space is exhausted; see {@link allocateUid}.
     */
    create(value: TValue): ISession<TValue> {
        const uid = allocateUid({
            sessions: this.sessions,
            reservations: this.reservations,
            uidExist: this.requirements.uidExist,
            random: this.random,
            length: this.uidLength,
            logger: this.logger,
        });

        try {
            const session = new Session<TValue>({ uid, value }, this.tracker);
            this.sessions.addWithTimeout(uid, session, this.requirements.timeoutMs);
            this.storedUids.set(session, uid);
            this.modified.add(uid, session);
            this.logger?.debug("Session created.", { uidLength: uid.length });
            return session;
        } finally {
            this.reservations.release(uid);
        }
    }

    get(uid: string): ISession<TValue> | null {
        const entry = this.sessions.getEntry(uid);
        return entry ? entry.value() : null;
    }

    /**
     * Looks up the session named by the request cookie {@link Requirements.defaultKey}.
     */
    getFromCookie(source: CookieSource | null | undefined): ISession<TValue> | null {
        const uid = extractUid(source, this.requirements.defaultKey, this.logger);
        if (uid === null) {
            return null;
        }

        const session = this.get(uid);
        if (!session) {
            this.logger?.debug("Session not found for cookie.", { name: this.requirements.defaultKey });
        }
        return session;
    }

    /**
     * Drops `uid` from the store and every modified entry of its session, including the
     * one a rename through `setUid` added under the new uid.
     */
    remove(uid: string): void {
        const session = this.get(uid) ?? this.getModified(uid);
        this.sessions.remove(uid);
        this.modified.remove(uid);

        if (session) {
            for (const [key, modified] of this.modifiedEntries()) {
                if (modified === session) this.modified.remove(key);
            }
        }
        this.logger?.debug("Session removed.", { uidLength: uid.length });
    }

    exist(uid: string): boolean {
        return this.sessions.exist(uid);
    }

    /**
     * `true` if `value` is a session of this store that is still live, whether or not
     * it has been renamed through `setUid` since it was stored.
     */
    contains(value: unknown): value is ISession<TValue> {
        return typeof value === "object" && value !== null && this.liveUidOf(value) !== null;
    }

    /**
     * Uid `session` is stored under, which differs from `session.uid()` after a rename.
     * `null` once the session is no longer live.
     */
    storedUid(session: ISession<TValue>): string | null {
        return this.liveUidOf(session);
    }

    /**
     * Distinct sessions in the modified index. A renamed session is listed once.
     */
    modifiedSessions(): ISession<TValue>[] {
        return [...new Set(this.modified.values())];
    }

    /**
     * The session the modified index holds under `uid`.
     */
    getModified(uid: string): ISession<TValue> | null {
        const entry = this.modified.getEntry(uid);
        return entry ? entry.value() : null;
    }

    /**
     * Modified index as `[uid, session]` pairs. A session renamed through `setUid` appears
     * under both its old and its new uid until each entry is cleared.
     */
    modifiedEntries(): Array<[string, ISession<TValue>]> {
        const entries: Array<[string, ISession<TValue>]> = [];
        for (const uid of this.modified.keys()) {
            const entry = this.modified.getEntry(uid);
            if (entry) entries.push([uid, entry.value()]);
        }
        return entries;
    }

    isModified(uid: string): boolean {
        return this.modified.exist(uid);
    }

    get modifiedCount(): number {
        return this.modified.size;
    }

    /**
     * Drops `uid` from the modified index. With `revision`, only if the session has not
     * changed since the snapshot carrying that revision was taken.
     */
    clearModified(uid: string, revision?: number): boolean {
        const entry = this.modified.getEntry(uid);
        if (!entry) {
            return false;
        }

        if (revision !== undefined && entry.value().snapshot().revision !== revision) {
            return false;
        }

        this.modified.remove(uid);
        return true;
    }

    close(): void {
        this.sessions.close?.();
        this.modified.close?.();
    }

    private liveUidOf(value: object): string | null {
        const uid = this.storedUids.get(value);
        return uid !== undefined && this.get(uid) === value ? uid : null;
    }

    private onModified(session: ISession<TValue>): void {
        const uid = session.uid();
        this.modified.add(uid, session);

        // a session renamed through setUid is still stored under its old uid
        const live = this.sessions.getEntry(uid);
        if (live && live.value() === session) {
            this.sessions.touch?.(uid, this.requirements.timeoutMs);
        }
    }
}
