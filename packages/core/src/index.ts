export * from "./types";
export * from "./errors";
export * from "./requirements";

export * from "./http/HttpContext";

export * from "./cache/Cache";
export * from "./cache/MemoryCache";

export * from "./uid/randomId";
export * from "./uid/UidAllocator";

export * from "./session/ISession";
export * from "./session/Session";
export * from "./session/SessionSerializer";

export * from "./store/SessionStore";

export * from "./cookie/CookieCodec";
export * from "./cookie/CookieBinder";
export * from "./lock/LockProvider";

export * from "./CookieSessions";
