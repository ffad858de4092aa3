import { afterEach, describe, expect, it, vi } from "vitest";
import { CookieSessions, SessionStore, SidstoreError } from "../src";
import type { CookieRecord, HttpContext } from "../src";

type Cart = { items: string[] };

class FakeHttpContext implements HttpContext {
  private session: unknown = null;
  private readonly requestCookies: Map<string, string>;
  readonly setCookies: CookieRecord[] = [];
  responseStatus = 200;
  responseBody: unknown = null;

  constructor(private readonly jar: Map<string, string>) {
    this.requestCookies = new Map(jar);
  }

  cookie(name: string): CookieRecord | null {
    const value = this.requestCookies.get(name);
    return value === undefined ? null : { name, value };
  }

  setCookie(cookie: CookieRecord): void {
    if (cookie.maxAgeSeconds === 0) {
      this.jar.delete(cookie.name);
    } else {
      this.jar.set(cookie.name, cookie.value);
    }
    this.setCookies.push(cookie);
  }

  setSession(session: unknown): void {
    this.session = session;
  }

  getSession(): unknown {
    return this.session;
  }

  status(code: number): void {
    this.responseStatus = code;
  }

  json(body: unknown): void {
    this.responseBody = body;
  }
}

const passThrough = async () => Promise.resolve();

describe("CookieSessions", () => {
  const stores: SessionStore<Cart>[] = [];

  function createStore(): SessionStore<Cart> {
    const store = new SessionStore<Cart>();
    stores.push(store);
    return store;
  }

  afterEach(() => {
    for (const store of stores.splice(0)) store.close();
  });

  it("middleware_attaches_null_without_a_cookie", async () => {
    const sessions = new CookieSessions(createStore());
    const ctx = new FakeHttpContext(new Map());
    const next = vi.fn(passThrough);

    await sessions.middleware()(ctx, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(sessions.getSession(ctx)).toBeNull();
    expect(ctx.setCookies).toHaveLength(0);
  });

  it("middleware_creates_a_session_and_sets_its_cookie", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const jar = new Map<string, string>();
    const ctx = new FakeHttpContext(jar);

    await sessions.middleware()(ctx, passThrough);

    const session = sessions.getSession(ctx);
    expect(session).not.toBeNull();
    expect(session?.key()).toBe("_ssid");
    expect(session?.value()).toEqual({ items: [] });
    expect(ctx.setCookies).toEqual([
      { path: "/", httpOnly: true, sameSite: "lax", name: "_ssid", value: session?.uid() },
    ]);
    expect(jar.get("_ssid")).toBe(session?.uid());
  });

  it("middleware_resolves_the_session_from_the_cookie_on_later_requests", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const jar = new Map<string, string>();

    const first = new FakeHttpContext(jar);
    await sessions.middleware()(first, passThrough);
    sessions.getSession(first)?.setValue({ items: ["apple"] });

    const second = new FakeHttpContext(jar);
    await sessions.middleware()(second, passThrough);

    expect(sessions.getSession(second)).toBe(sessions.getSession(first));
    expect(sessions.getSession(second)?.value()).toEqual({ items: ["apple"] });
    expect(second.setCookies).toHaveLength(0);
  });

  it("middleware_passes_custom_cookie_attributes_through", async () => {
    const sessions = new CookieSessions(createStore(), {
      createIfMissing: () => ({ items: [] }),
      cookie: { domain: "example.com", secure: true },
    });
    const ctx = new FakeHttpContext(new Map());

    await sessions.middleware()(ctx, passThrough);

    expect(ctx.setCookies).toEqual([
      { domain: "example.com", secure: true, name: "_ssid", value: sessions.getSession(ctx)?.uid() },
    ]);
  });

  it("requireSession_throws_SESSION_REQUIRED_without_a_session", async () => {
    const sessions = new CookieSessions(createStore());
    const ctx = new FakeHttpContext(new Map());
    await sessions.middleware()(ctx, passThrough);

    const next = vi.fn(passThrough);
    await expect(sessions.requireSession()(ctx, next)).rejects.toMatchObject({
      code: "SESSION_REQUIRED",
      message: "Session required.",
    });
    await expect(sessions.requireSession()(ctx, next)).rejects.toBeInstanceOf(SidstoreError);
    expect(next).not.toHaveBeenCalled();
  });

  it("requireSession_delegates_to_onFail", async () => {
    const sessions = new CookieSessions(createStore());
    const ctx = new FakeHttpContext(new Map());
    const next = vi.fn(passThrough);

    await sessions.requireSession({
      onFail(c) {
        c.status(302);
        c.json({ redirect: "/start" });
      },
    })(ctx, next);

    expect(next).not.toHaveBeenCalled();
    expect(ctx.responseStatus).toBe(302);
    expect(ctx.responseBody).toEqual({ redirect: "/start" });
  });

  it("requireSession_continues_with_a_session", async () => {
    const sessions = new CookieSessions(createStore(), { createIfMissing: () => ({ items: [] }) });
    const ctx = new FakeHttpContext(new Map());
    await sessions.middleware()(ctx, passThrough);

    const next = vi.fn(passThrough);
    await sessions.requireSession()(ctx, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it("getSession_ignores_sessions_removed_from_the_store", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const ctx = new FakeHttpContext(new Map());
    await sessions.middleware()(ctx, passThrough);

    const uid = sessions.getSession(ctx)?.uid() ?? "";
    store.remove(uid);

    expect(sessions.getSession(ctx)).toBeNull();
  });

  it("getSession_keeps_a_session_renamed_during_the_request", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const ctx = new FakeHttpContext(new Map());
    await sessions.middleware()(ctx, passThrough);
    const session = sessions.getSession(ctx);

    session?.setUid("renamed");

    expect(session).not.toBeNull();
    expect(sessions.getSession(ctx)).toBe(session);
  });

  it("getSession_ignores_sessions_of_another_store", () => {
    const sessions = new CookieSessions(createStore());
    const ctx = new FakeHttpContext(new Map());

    ctx.setSession(createStore().create({ items: [] }));

    expect(sessions.getSession(ctx)).toBeNull();
  });

  it("getSession_ignores_foreign_values", () => {
    const sessions = new CookieSessions(createStore());
    const ctx = new FakeHttpContext(new Map());

    ctx.setSession({ uid: "not-a-method" });
    expect(sessions.getSession(ctx)).toBeNull();

    ctx.setSession("plain string");
    expect(sessions.getSession(ctx)).toBeNull();
  });

  it("destroy_removes_the_session_and_expires_the_cookie", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const jar = new Map<string, string>();
    await sessions.middleware()(new FakeHttpContext(jar), passThrough);
    const uid = jar.get("_ssid") ?? "";

    const ctx = new FakeHttpContext(jar);
    await sessions.middleware()(ctx, passThrough);
    sessions.destroy(ctx);

    expect(store.exist(uid)).toBe(false);
    expect(jar.has("_ssid")).toBe(false);
    expect(ctx.setCookies).toEqual([
      { path: "/", httpOnly: true, sameSite: "lax", name: "_ssid", value: "", maxAgeSeconds: 0 },
    ]);
    expect(sessions.getSession(ctx)).toBeNull();
  });

  it("destroy_removes_a_renamed_session_under_its_stored_uid", async () => {
    const store = createStore();
    const sessions = new CookieSessions(store, { createIfMissing: () => ({ items: [] }) });
    const ctx = new FakeHttpContext(new Map());
    await sessions.middleware()(ctx, passThrough);
    const session = sessions.getSession(ctx);
    const original = session?.uid() ?? "";
    session?.setUid("renamed");

    sessions.destroy(ctx);

    expect(store.exist(original)).toBe(false);
    expect(store.modifiedCount).toBe(0);
  });

  it("destroy_falls_back_to_the_request_cookie", () => {
    const store = createStore();
    const sessions = new CookieSessions(store);
    const s = store.create({ items: [] });
    const ctx = new FakeHttpContext(new Map([["_ssid", s.uid()]]));

    sessions.destroy(ctx);

    expect(store.exist(s.uid())).toBe(false);
  });
});
