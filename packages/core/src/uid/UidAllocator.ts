import type { Logger } from "../errors";
import type { RandomSource } from "./randomId";

/**
 * Uids claimed by in-flight allocations but not yet committed to a store.
 */
export class UidReservations {
    private readonly claimed = new Set<string>();

    /**
     * Claims `uid` if nobody holds it. Returns `false` when it is already claimed.
     */
    claim(uid: string): boolean {
        if (this.claimed.has(uid)) return false;
        this.claimed.add(uid);
        return true;
    }

    release(uid: string): void {
        this.claimed.delete(uid);
    }

    has(uid: string): boolean {
        return this.claimed.has(uid);
    }

    get size(): number {
        return this.claimed.size;
    }
}

export type UidAllocationContext = {
    sessions: { exist(uid: string): boolean };
    reservations: UidReservations;
    uidExist: (uid: string) => boolean;
    random: RandomSource;
    length: number;
    logger?: Logger;
};

/**
 * Draws candidates until one is unknown to the live sessions, the reservations and `uidExist`.
 *
 * The returned uid stays claimed in `reservations`; the caller releases it once committed.
 * The claim happens before `uidExist` runs, so a predicate that starts another allocation
 * cannot be handed the same candidate.
 *
 * There is no retry bound. With a small identifier space, or a `uidExist` that always
 * answers `true`, this never returns.
 */
export function allocateUid(ctx: UidAllocationContext): string {
    for (;;) {
        const candidate = ctx.random({ length: ctx.length });

        if (ctx.sessions.exist(candidate) || !ctx.reservations.claim(candidate)) {
            ctx.logger?.debug("Uid collision, retrying.", { source: "local" });
            continue;
        }

        let taken: boolean;
        try {
            taken = ctx.uidExist(candidate);
        } catch (e) {
            ctx.reservations.release(candidate);
            throw e;
        }

        if (taken) {
            ctx.reservations.release(candidate);
            ctx.logger?.debug("Uid collision, retrying.", { source: "uidExist" });
            continue;
        }

        return candidate;
    }
}
