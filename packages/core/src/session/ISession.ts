import type { CookieSink } from "../cookie/CookieBinder";
import type { CookieTemplate } from "../cookie/CookieCodec";

/**
 * Point-in-time copy of a session, as handed to persistence.
 */
export type SessionSnapshot<TValue> = {
  uid: string;
  key: string;
  value: TValue;
  lastModified: number; // epoch ms
  revision: number;
};

/**
 * Public surface of a session handle.
 *
 * Every mutator stamps `lastModified` and marks the session modified in its store.
 */
export interface ISession<TValue> {
  uid(): string;
  /**
   * Changes the uid this session reports. The store keeps it under the uid it was created with;
   * re-keying is the store owner's job.
   */
  setUid(uid: string): void;
  key(): string;
  setKey(key: string): void;
  value(): TValue;
  setValue(value: TValue): void;
  lastModified(): Date;
  updateLastModified(): void;
  snapshot(): SessionSnapshot<TValue>;
  setHttpCookie<TTarget>(target: TTarget, sink: CookieSink<TTarget>, template?: CookieTemplate): void;
}

/**
 * Non-owning link from a session back to the store that tracks its modifications.
 */
export interface ModifiedTracker<TValue> {
  markModified(session: ISession<TValue>): void;
}
