import { bindCookie, type CookieSink } from "../cookie/CookieBinder";
import type { CookieTemplate } from "../cookie/CookieCodec";
import type { ISession, ModifiedTracker, SessionSnapshot } from "./ISession";

type SessionState<TValue> = {
    uid: string;
    key: string;
    value: TValue;
    lastModified: number;
    revision: number;
};

/**
 * A single session handle. Instances come from {@link SessionStore.create}.
 *
 * Handles are shared by reference: every holder sees every other holder's writes.
 */
export class Session<TValue> implements ISession<TValue> {
    private readonly state: SessionState<TValue>;

    /** @internal */
    constructor(
        init: { uid: string; value: TValue },
        private readonly tracker: ModifiedTracker<TValue>
    ) {
        this.state = {
            uid: init.uid,
            key: "",
            value: init.value,
            lastModified: Date.now(),
            revision: 0,
        };
    }

    uid(): string {
        return this.state.uid;
    }

    setUid(uid: string): void {
        this.mutate((s) => {
            s.uid = uid;
        });
    }

    key(): string {
        return this.state.key;
    }

    setKey(key: string): void {
        this.mutate((s) => {
            s.key = key;
        });
    }

    value(): TValue {
        return this.state.value;
    }

    setValue(value: TValue): void {
        this.mutate((s) => {
            s.value = value;
        });
    }

    lastModified(): Date {
        return new Date(this.state.lastModified);
    }

    updateLastModified(): void {
        this.mutate(() => undefined);
    }

    snapshot(): SessionSnapshot<TValue> {
        return { ...this.state };
    }

    setHttpCookie<TTarget>(target: TTarget, sink: CookieSink<TTarget>, template?: CookieTemplate): void {
        sink(target, bindCookie(this, template));
    }

    private mutate(apply: (s: SessionState<TValue>) => void): void {
        apply(this.state);
        // never step back, even if the wall clock does
        this.state.lastModified = Math.max(this.state.lastModified, Date.now());
        this.state.revision += 1;
        this.tracker.markModified(this);
    }
}
