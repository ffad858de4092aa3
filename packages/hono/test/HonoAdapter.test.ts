import { afterEach, describe, expect, it, vi } from "vitest";
import { Hono } from "hono";
import { SessionStore, SidstoreError, type HttpMiddleware } from "@sidstore/core";
import { createHonoCookieSink, createHonoHttpContext, honoCookieSink, toHonoMiddleware } from "../src";

const requiredMiddleware: HttpMiddleware = async () => {
  throw new SidstoreError("SESSION_REQUIRED", "Session required.");
};

describe("HonoAdapter", () => {
  const stores: SessionStore<string>[] = [];

  afterEach(() => {
    for (const store of stores.splice(0)) store.close();
  });

  it("maps SESSION_REQUIRED to default JSON response", async () => {
    const app = new Hono();

    app.use("/me", toHonoMiddleware(requiredMiddleware));
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(401);
    await expect(res.json()).resolves.toEqual({
      error: {
        code: "SESSION_REQUIRED",
        message: "Session required.",
      },
    });
  });

  it("maps STORE_UNAVAILABLE to 503", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(async () => {
        throw new SidstoreError("STORE_UNAVAILABLE", "Session store is unavailable.");
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(503);
  });

  it("supports onError override", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(requiredMiddleware, {
        onError(_error, c) {
          return c.redirect("/login", 302);
        },
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me", { redirect: "manual" });
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/login");
  });

  it("appends multiple Set-Cookie values", async () => {
    const app = new Hono();

    app.use(
      "/cookie",
      toHonoMiddleware(async (ctx, next) => {
        ctx.setCookie({ name: "sid", value: "token-1", path: "/", httpOnly: true });
        ctx.setCookie({ name: "sid", value: "", path: "/", maxAgeSeconds: 0 });
        await next();
      }),
    );
    app.get("/cookie", (c) => c.text("ok"));

    const res = await app.request("http://localhost/cookie");

    expect(res.headers.getSetCookie()).toEqual(["sid=token-1; Path=/; HttpOnly", "sid=; Max-Age=0; Path=/"]);
  });

  it("reads request cookies and keeps the session slot per request", async () => {
    const app = new Hono();

    app.get("/echo", (c) => {
      const ctx = createHonoHttpContext(c);
      ctx.setSession("attached");
      return c.json({
        cookie: ctx.cookie("_ssid"),
        missing: ctx.cookie("nope"),
        session: createHonoHttpContext(c).getSession(),
      });
    });

    const res = await app.request("http://localhost/echo", { headers: { cookie: "_ssid=abc; theme=dark" } });
    await expect(res.json()).resolves.toEqual({
      cookie: { name: "_ssid", value: "abc" },
      missing: null,
      session: "attached",
    });
  });

  it("skips the cookie of a session whose key is unset", async () => {
    const store = new SessionStore<string>();
    stores.push(store);
    const warn = vi.fn();
    const app = new Hono();

    app.get("/fresh", (c) => {
      const session = store.create("v");
      session.setHttpCookie(c, createHonoCookieSink({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() }));
      session.setHttpCookie(c, honoCookieSink, { path: "/" });
      return c.text("ok");
    });

    const res = await app.request("http://localhost/fresh");

    expect(res.status).toBe(200);
    expect(res.headers.getSetCookie()).toEqual([]);
    expect(warn).toHaveBeenCalledWith("Skipping cookie with an invalid name.", { name: "" });
  });
});
